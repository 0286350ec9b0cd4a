import {
  ApprovalStatus,
  ContentItem,
  ContentKind,
  collectionOf,
  headlineOf,
  textOf
} from '../models/Content';
import { Editor, Reader, User, displayName } from '../models/User';
import { StoreReader, Transaction } from '../storage/DataStore';
import { Clock } from '../utils/clock';
import { InvalidStateError, NotFoundError } from '../utils/errors';
import { preview } from '../utils/text';
import { AsyncTaskQueue, TaskType } from './asyncTaskQueue';
import { Action, assertCanReview, requireEditor } from './permissionGuard';
import { composePost } from './socialPoster';
import { SubscriptionIndex } from './subscriptionIndex';

export interface ApprovalResult {
  item: ContentItem;
  notificationRecipients: number;
  socialPostQueued: boolean;
}

export interface ApprovalWorkflowDeps {
  queue: AsyncTaskQueue;
  subscriptions: SubscriptionIndex;
  clock: Clock;
  siteUrl: string;
}

const PREVIEW_LENGTH = 200;

const kindLabel = (kind: ContentKind): string =>
  kind === ContentKind.ARTICLE ? 'Article' : 'Newsletter';

export const contentLink = (siteUrl: string, item: ContentItem): string =>
  `${siteUrl}/api/${collectionOf(item.kind)}/${item.id}/`;

/**
 * Pending → Approved | Rejected. Both outcomes are terminal. Approval
 * queues the subscriber notification and the social post after the
 * transaction commits; their failures never undo the approval.
 */
export class ApprovalWorkflow {
  constructor(private readonly deps: ApprovalWorkflowDeps) {}

  approve(tx: Transaction, kind: ContentKind, itemId: number, user: User): ApprovalResult {
    const editor = requireEditor(user, Action.REVIEW_CONTENT);
    const item = this.loadPending(tx, kind, itemId, editor, 'approve');

    const approved = tx.updateContent({
      ...item,
      status: ApprovalStatus.APPROVED,
      approvedBy: editor.id,
      rejectedBy: null,
      updatedAt: this.deps.clock()
    });

    const audience = this.deps.subscriptions.audienceOf(tx, approved.authorId, approved.publisherId);
    const socialPostQueued = editor.socialConnection !== null;

    tx.afterCommit(() => {
      console.log(`📝 ${kindLabel(kind)} ${approved.id} approved by ${editor.username}`);
      this.queueNotification(tx, approved, audience);
      if (socialPostQueued) {
        this.queueSocialPost(tx, approved, editor);
      }
    });

    return { item: approved, notificationRecipients: audience.length, socialPostQueued };
  }

  reject(tx: Transaction, kind: ContentKind, itemId: number, user: User): ContentItem {
    const editor = requireEditor(user, Action.REVIEW_CONTENT);
    const item = this.loadPending(tx, kind, itemId, editor, 'reject');

    const rejected = tx.updateContent({
      ...item,
      status: ApprovalStatus.REJECTED,
      approvedBy: null,
      rejectedBy: editor.id,
      updatedAt: this.deps.clock()
    });

    tx.afterCommit(() => {
      console.log(`📝 ${kindLabel(kind)} ${rejected.id} rejected by ${editor.username}`);
    });
    return rejected;
  }

  private loadPending(
    tx: Transaction,
    kind: ContentKind,
    itemId: number,
    editor: Editor,
    transition: 'approve' | 'reject'
  ): ContentItem {
    const item = tx.getContent(kind, itemId);
    if (!item) {
      throw new NotFoundError(`${kindLabel(kind)} not found`);
    }

    assertCanReview(editor, item);

    if (item.status !== ApprovalStatus.PENDING) {
      throw new InvalidStateError(`Cannot ${transition} ${kind} ${item.id}: it is already ${item.status}`, {
        currentStatus: item.status
      });
    }
    return item;
  }

  private queueNotification(store: StoreReader, item: ContentItem, audience: Reader[]): void {
    if (audience.length === 0) {
      return;
    }

    const author = store.getUser(item.authorId);
    const authorName = author ? author.username : 'unknown';
    const publisher = item.publisherId !== null ? store.getPublisher(item.publisherId) : undefined;
    const source = publisher ? publisher.name : authorName;
    const label = kindLabel(item.kind);

    const reason = publisher
      ? `you subscribe to ${publisher.name} or follow ${authorName}`
      : `you follow ${authorName}`;

    this.deps.queue.enqueue({
      id: `${item.kind}-${item.id}-notification`,
      type: TaskType.NOTIFY_SUBSCRIBERS,
      payload: {
        contentKind: item.kind,
        contentId: item.id,
        recipients: audience.map((reader) => reader.email),
        subject: `New ${label} from ${source}: ${headlineOf(item)}`,
        body: [
          `New ${label} from ${source}`,
          '',
          `Title: ${headlineOf(item)}`,
          `Author: ${authorName}`,
          `Published: ${item.createdAt.toISOString()}`,
          '',
          preview(textOf(item), PREVIEW_LENGTH),
          '',
          '---',
          `This email was sent because ${reason}.`
        ].join('\n'),
        reference: contentLink(this.deps.siteUrl, item)
      }
    });
  }

  private queueSocialPost(store: StoreReader, item: ContentItem, editor: Editor): void {
    const author = store.getUser(item.authorId);

    this.deps.queue.enqueue({
      id: `${item.kind}-${item.id}-social`,
      type: TaskType.POST_TO_SOCIAL,
      payload: {
        contentKind: item.kind,
        contentId: item.id,
        editorId: editor.id,
        text: composePost(item, author ? displayName(author) : 'Newsroom', contentLink(this.deps.siteUrl, item)),
        imageId: item.imageId
      }
    });
  }
}
