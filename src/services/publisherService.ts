import { CreatePublisherDTO, Publisher } from '../models/Publisher';
import { Editor, Role, User } from '../models/User';
import { StoreReader, Transaction } from '../storage/DataStore';
import { Clock } from '../utils/clock';
import { ConflictError, NotFoundError } from '../utils/errors';
import { Action, requireEditor } from './permissionGuard';

export interface PublisherDetail {
  publisher: Publisher;
  editors: Editor[];
  subscriberCount: number;
}

export class PublisherService {
  constructor(private readonly clock: Clock) {}

  /** An editor without an affiliation joins the publisher they create. */
  create(tx: Transaction, user: User, dto: CreatePublisherDTO): Publisher {
    const editor = requireEditor(user, Action.CREATE_PUBLISHER);
    const name = dto.name.trim();

    if (tx.findPublisherByName(name)) {
      throw new ConflictError(`A publisher named '${name}' already exists`, 'PUBLISHER_EXISTS');
    }

    const publisher = tx.insertPublisher({
      name,
      description: dto.description?.trim() ?? '',
      createdAt: this.clock()
    });

    if (editor.affiliatedPublisherId === null) {
      tx.updateUser({ ...editor, affiliatedPublisherId: publisher.id });
    }

    tx.afterCommit(() => {
      console.log(`📝 Publisher '${publisher.name}' created by ${editor.username}`);
    });
    return publisher;
  }

  list(store: StoreReader): Publisher[] {
    return store.listPublishers().sort((a, b) => a.name.localeCompare(b.name));
  }

  detail(store: StoreReader, id: number): PublisherDetail {
    const publisher = store.getPublisher(id);
    if (!publisher) {
      throw new NotFoundError('Publisher not found');
    }

    const editors = store
      .listUsersByRole(Role.EDITOR)
      .filter((editor) => editor.affiliatedPublisherId === publisher.id)
      .sort((a, b) => a.username.localeCompare(b.username));

    return {
      publisher,
      editors,
      subscriberCount: store.subscribersOfPublisher(publisher.id).length
    };
  }
}
