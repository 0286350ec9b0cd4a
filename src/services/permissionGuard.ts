import { ContentItem, ApprovalStatus } from '../models/Content';
import { Editor, Journalist, Reader, Role, User } from '../models/User';
import { InvalidStateError, PermissionError } from '../utils/errors';

export enum Action {
  CREATE_CONTENT = 'create_content',
  ATTACH_MEDIA = 'attach_media',
  EDIT_CONTENT = 'edit_content',
  REVIEW_CONTENT = 'review_content',
  MANAGE_SUBSCRIPTIONS = 'manage_subscriptions',
  VIEW_ALL_CONTENT = 'view_all_content',
  BROWSE_APPROVED = 'browse_approved',
  CREATE_PUBLISHER = 'create_publisher',
  MANAGE_SOCIAL = 'manage_social_connection'
}

const ACTION_LABELS: Record<Action, string> = {
  [Action.CREATE_CONTENT]: 'create content',
  [Action.ATTACH_MEDIA]: 'attach media to content',
  [Action.EDIT_CONTENT]: 'edit or delete content',
  [Action.REVIEW_CONTENT]: 'approve or reject content',
  [Action.MANAGE_SUBSCRIPTIONS]: 'manage subscriptions',
  [Action.VIEW_ALL_CONTENT]: 'view unapproved content',
  [Action.BROWSE_APPROVED]: 'browse all approved content',
  [Action.CREATE_PUBLISHER]: 'create publishers',
  [Action.MANAGE_SOCIAL]: 'manage social connections'
};

const assertNever = (value: never): never => {
  throw new Error(`Unhandled role: ${JSON.stringify(value)}`);
};

/** Role × operation table. */
export const can = (user: User, action: Action): boolean => {
  switch (user.role) {
    case Role.READER:
      return action === Action.MANAGE_SUBSCRIPTIONS || action === Action.BROWSE_APPROVED;
    case Role.JOURNALIST:
      return (
        action === Action.CREATE_CONTENT ||
        action === Action.ATTACH_MEDIA ||
        action === Action.EDIT_CONTENT ||
        action === Action.VIEW_ALL_CONTENT
      );
    case Role.EDITOR:
      return (
        action === Action.REVIEW_CONTENT ||
        action === Action.EDIT_CONTENT ||
        action === Action.VIEW_ALL_CONTENT ||
        action === Action.CREATE_PUBLISHER ||
        action === Action.MANAGE_SOCIAL
      );
    default:
      return assertNever(user);
  }
};

const deny = (user: User, action: Action): PermissionError =>
  new PermissionError(`Role '${user.role}' may not ${ACTION_LABELS[action]}`, {
    role: user.role,
    action
  });

export const assertAllowed = (user: User, action: Action): void => {
  if (!can(user, action)) {
    throw deny(user, action);
  }
};

export const requireReader = (user: User, action: Action): Reader => {
  if (user.role !== Role.READER || !can(user, action)) {
    throw deny(user, action);
  }
  return user;
};

export const requireJournalist = (user: User, action: Action): Journalist => {
  if (user.role !== Role.JOURNALIST || !can(user, action)) {
    throw deny(user, action);
  }
  return user;
};

export const requireEditor = (user: User, action: Action): Editor => {
  if (user.role !== Role.EDITOR || !can(user, action)) {
    throw deny(user, action);
  }
  return user;
};

/**
 * Publisher content is reviewed by editors of that publisher only;
 * independent content may be reviewed by any editor.
 */
export const assertCanReview = (editor: Editor, item: ContentItem): void => {
  if (item.publisherId === null) {
    return;
  }
  if (editor.affiliatedPublisherId === null) {
    throw new PermissionError('You must be affiliated with a publisher to review its content', {
      publisherId: item.publisherId
    });
  }
  if (editor.affiliatedPublisherId !== item.publisherId) {
    throw new PermissionError('You can only review content of your own publisher', {
      publisherId: item.publisherId,
      affiliatedPublisherId: editor.affiliatedPublisherId
    });
  }
};

const assertPending = (item: ContentItem): void => {
  if (item.status !== ApprovalStatus.PENDING) {
    throw new InvalidStateError(`Cannot modify ${item.kind} once it is ${item.status}`, {
      currentStatus: item.status
    });
  }
};

export const assertOwnsPendingContent = (journalist: Journalist, item: ContentItem): void => {
  if (item.authorId !== journalist.id) {
    throw new PermissionError('You can only modify your own content');
  }
  assertPending(item);
};

/**
 * Pending items may be edited or deleted by their author, or by an editor
 * who could review them.
 */
export const assertCanEdit = (user: User, item: ContentItem): void => {
  switch (user.role) {
    case Role.READER:
      throw deny(user, Action.EDIT_CONTENT);
    case Role.JOURNALIST:
      assertOwnsPendingContent(user, item);
      return;
    case Role.EDITOR:
      assertCanReview(user, item);
      assertPending(item);
      return;
    default:
      assertNever(user);
  }
};

/** Readers may open approved items only. */
export const assertCanView = (user: User, item: ContentItem): void => {
  if (item.status !== ApprovalStatus.APPROVED && !can(user, Action.VIEW_ALL_CONTENT)) {
    throw new PermissionError(`This ${item.kind} is not published yet`);
  }
};
