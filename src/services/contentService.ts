import {
  ApprovalStatus,
  ContentItem,
  ContentKind,
  CreateContentDTO,
  UpdateContentDTO
} from '../models/Content';
import { User } from '../models/User';
import { DataStore, NewContent, StoreReader, Transaction } from '../storage/DataStore';
import { Clock } from '../utils/clock';
import { NotFoundError, PermissionError } from '../utils/errors';
import { FileMetadata, FileStorageService, UploadedFile } from './fileStorage';
import {
  Action,
  assertCanEdit,
  assertCanView,
  assertOwnsPendingContent,
  requireJournalist
} from './permissionGuard';

const notFound = (kind: ContentKind): NotFoundError =>
  new NotFoundError(`${kind === ContentKind.ARTICLE ? 'Article' : 'Newsletter'} not found`);

export class ContentService {
  constructor(
    private readonly fileStorage: FileStorageService,
    private readonly clock: Clock
  ) {}

  /** New items always start pending and are authored by the caller. */
  create(tx: Transaction, user: User, dto: CreateContentDTO, authorId?: number): ContentItem {
    const journalist = requireJournalist(user, Action.CREATE_CONTENT);

    if (authorId !== undefined && authorId !== journalist.id) {
      throw new PermissionError('Journalists can only create content under their own name');
    }
    if (dto.publisherId !== null && !tx.getPublisher(dto.publisherId)) {
      throw new NotFoundError('Publisher not found');
    }

    const now = this.clock();
    const common = {
      authorId: journalist.id,
      publisherId: dto.publisherId,
      status: ApprovalStatus.PENDING,
      approvedBy: null,
      rejectedBy: null,
      imageId: null,
      createdAt: now,
      updatedAt: now
    };

    const data: NewContent =
      dto.kind === ContentKind.ARTICLE
        ? { ...common, kind: ContentKind.ARTICLE, title: dto.title, body: dto.body }
        : { ...common, kind: ContentKind.NEWSLETTER, subject: dto.subject, content: dto.content };

    const item = tx.insertContent(data);
    tx.afterCommit(() => {
      console.log(`📝 ${item.kind} ${item.id} created by ${journalist.username} (pending approval)`);
    });
    return item;
  }

  update(tx: Transaction, user: User, kind: ContentKind, id: number, dto: UpdateContentDTO): ContentItem {
    const item = tx.getContent(kind, id);
    if (!item) {
      throw notFound(kind);
    }
    assertCanEdit(user, item);

    if (dto.publisherId !== undefined && dto.publisherId !== null && !tx.getPublisher(dto.publisherId)) {
      throw new NotFoundError('Publisher not found');
    }

    const common = {
      publisherId: dto.publisherId === undefined ? item.publisherId : dto.publisherId,
      updatedAt: this.clock()
    };
    const next: ContentItem =
      item.kind === ContentKind.ARTICLE
        ? { ...item, ...common, title: dto.headline ?? item.title, body: dto.text ?? item.body }
        : { ...item, ...common, subject: dto.headline ?? item.subject, content: dto.text ?? item.content };

    // An editor may not move an item out of their own publisher.
    assertCanEdit(user, next);

    const updated = tx.updateContent(next);
    tx.afterCommit(() => {
      console.log(`📝 ${kind} ${id} updated by ${user.username}`);
    });
    return updated;
  }

  remove(tx: Transaction, user: User, kind: ContentKind, id: number): void {
    const item = tx.getContent(kind, id);
    if (!item) {
      throw notFound(kind);
    }
    assertCanEdit(user, item);

    tx.deleteContent(kind, id);
    tx.afterCommit(() => {
      if (item.imageId) {
        this.fileStorage.deleteFile(item.imageId);
      }
      console.log(`🗑️  ${kind} ${id} deleted by ${user.username}`);
    });
  }

  get(store: StoreReader, user: User, kind: ContentKind, id: number): ContentItem {
    const item = store.getContent(kind, id);
    if (!item) {
      throw notFound(kind);
    }
    assertCanView(user, item);
    return item;
  }

  async attachImage(
    store: DataStore,
    user: User,
    kind: ContentKind,
    id: number,
    file: UploadedFile
  ): Promise<{ item: ContentItem; file: FileMetadata }> {
    const journalist = requireJournalist(user, Action.ATTACH_MEDIA);
    const current = store.getContent(kind, id);
    if (!current) {
      throw notFound(kind);
    }
    assertOwnsPendingContent(journalist, current);

    const metadata = await this.fileStorage.storeFile(file, journalist.id);

    let replacedImageId: string | null = null;
    try {
      const item = store.transaction((tx) => {
        // Re-read: the item may have been reviewed while the file was stored.
        const latest = tx.getContent(kind, id);
        if (!latest) {
          throw notFound(kind);
        }
        assertOwnsPendingContent(journalist, latest);
        replacedImageId = latest.imageId;
        return tx.updateContent({ ...latest, imageId: metadata.id, updatedAt: this.clock() });
      });

      if (replacedImageId) {
        this.fileStorage.deleteFile(replacedImageId);
      }
      return { item, file: metadata };
    } catch (error) {
      this.fileStorage.deleteFile(metadata.id);
      throw error;
    }
  }
}
