import { Publisher } from '../models/Publisher';
import { PublisherDetail } from '../services/publisherService';

export const serializePublisher = (publisher: Publisher) => ({
  id: publisher.id,
  name: publisher.name,
  description: publisher.description,
  created_at: publisher.createdAt.toISOString()
});

export const serializePublisherDetail = ({ publisher, editors, subscriberCount }: PublisherDetail) => ({
  ...serializePublisher(publisher),
  editors: editors.map((editor) => ({ id: editor.id, username: editor.username })),
  subscriber_count: subscriberCount
});
