import { APPROVAL_LABELS, ContentItem, ContentKind, isApproved } from '../models/Content';
import { StoreReader } from '../storage/DataStore';
import { FileStorageService } from '../services/fileStorage';
import { preview } from '../utils/text';

export interface SerializerContext {
  store: StoreReader;
  files: FileStorageService;
}

const PREVIEW_LENGTH = 150;


const userRef = (store: StoreReader, id: number | null) => {
  if (id === null) {
    return null;
  }
  const user = store.getUser(id);
  return user ? { id: user.id, username: user.username } : null;
};

const publisherRef = (store: StoreReader, id: number | null) => {
  if (id === null) {
    return null;
  }
  const publisher = store.getPublisher(id);
  return publisher ? { id: publisher.id, name: publisher.name } : null;
};

const statusFields = (item: ContentItem) => ({
  status: item.status,
  status_display: APPROVAL_LABELS[item.status],
  is_approved: isApproved(item)
});

/** List rows: headline, a short preview and who wrote it. */
export const serializeContentSummary = ({ store }: SerializerContext, item: ContentItem) => {
  const common = {
    id: item.id,
    kind: item.kind,
    author_username: store.getUser(item.authorId)?.username ?? null,
    publisher_name: publisherRef(store, item.publisherId)?.name ?? null,
    ...statusFields(item),
    created_at: item.createdAt.toISOString()
  };

  switch (item.kind) {
    case ContentKind.ARTICLE:
      return { ...common, title: item.title, body_preview: preview(item.body, PREVIEW_LENGTH) };
    case ContentKind.NEWSLETTER:
      return { ...common, subject: item.subject, content_preview: preview(item.content, PREVIEW_LENGTH) };
  }
};

export const serializeContent = ({ store, files }: SerializerContext, item: ContentItem) => {
  const common = {
    id: item.id,
    kind: item.kind,
    author: userRef(store, item.authorId),
    publisher: publisherRef(store, item.publisherId),
    ...statusFields(item),
    approved_by: userRef(store, item.approvedBy),
    rejected_by: userRef(store, item.rejectedBy),
    image_url: item.imageId ? files.generateDownloadUrl(item.imageId) : null,
    created_at: item.createdAt.toISOString(),
    updated_at: item.updatedAt.toISOString()
  };

  switch (item.kind) {
    case ContentKind.ARTICLE:
      return { ...common, title: item.title, body: item.body };
    case ContentKind.NEWSLETTER:
      return { ...common, subject: item.subject, content: item.content };
  }
};
