import { describe, expect, it } from '@jest/globals';
import { ApprovalStatus, Article, ContentKind } from '../../src/models/Content';
import { Editor, Journalist, Reader, Role } from '../../src/models/User';
import {
  Action,
  assertCanEdit,
  assertCanView,
  assertOwnsPendingContent,
  can,
  requireEditor,
  requireReader
} from '../../src/services/permissionGuard';
import { InvalidStateError, PermissionError } from '../../src/utils/errors';

const base = {
  email: 'someone@example.com',
  firstName: '',
  lastName: '',
  password: 'not-a-hash',
  createdAt: new Date('2024-01-01T00:00:00.000Z')
};

const reader: Reader = { ...base, id: 1, username: 'reader', role: Role.READER };
const journalist: Journalist = { ...base, id: 2, username: 'journalist', role: Role.JOURNALIST };
const editor: Editor = {
  ...base,
  id: 3,
  username: 'editor',
  role: Role.EDITOR,
  affiliatedPublisherId: null,
  socialConnection: null
};

const article = (overrides: Partial<Article> = {}): Article => ({
  id: 1,
  kind: ContentKind.ARTICLE,
  title: 'Title',
  body: 'Body',
  authorId: journalist.id,
  publisherId: null,
  status: ApprovalStatus.PENDING,
  approvedBy: null,
  rejectedBy: null,
  imageId: null,
  createdAt: base.createdAt,
  updatedAt: base.createdAt,
  ...overrides
});

describe('permission table', () => {
  const allowed = (action: Action) =>
    [reader, journalist, editor].filter((user) => can(user, action)).map((user) => user.role);

  it.each([
    [Action.CREATE_CONTENT, [Role.JOURNALIST]],
    [Action.ATTACH_MEDIA, [Role.JOURNALIST]],
    [Action.EDIT_CONTENT, [Role.JOURNALIST, Role.EDITOR]],
    [Action.REVIEW_CONTENT, [Role.EDITOR]],
    [Action.MANAGE_SUBSCRIPTIONS, [Role.READER]],
    [Action.VIEW_ALL_CONTENT, [Role.JOURNALIST, Role.EDITOR]],
    [Action.BROWSE_APPROVED, [Role.READER]],
    [Action.CREATE_PUBLISHER, [Role.EDITOR]],
    [Action.MANAGE_SOCIAL, [Role.EDITOR]]
  ])('%s is allowed for %j', (action, roles) => {
    expect(allowed(action)).toEqual(roles);
  });

  it('names the role and the action when denying', () => {
    expect(() => requireEditor(reader, Action.REVIEW_CONTENT)).toThrow(
      "Role 'reader' may not approve or reject content"
    );
  });

  it('returns the narrowed user when allowed', () => {
    expect(requireReader(reader, Action.MANAGE_SUBSCRIPTIONS)).toBe(reader);
  });
});

describe('content guards', () => {
  it('lets only the author touch a pending item', () => {
    const other: Journalist = { ...journalist, id: 9 };

    expect(() => assertOwnsPendingContent(journalist, article())).not.toThrow();
    expect(() => assertOwnsPendingContent(other, article())).toThrow(PermissionError);
    expect(() => assertOwnsPendingContent(journalist, article({ status: ApprovalStatus.APPROVED }))).toThrow(
      InvalidStateError
    );
  });

  it('lets the author or a reviewing editor edit a pending item', () => {
    const scoped: Editor = { ...editor, affiliatedPublisherId: 5 };
    const published = article({ status: ApprovalStatus.APPROVED, approvedBy: editor.id });

    expect(() => assertCanEdit(journalist, article())).not.toThrow();
    expect(() => assertCanEdit(editor, article())).not.toThrow();
    expect(() => assertCanEdit(scoped, article({ publisherId: 5 }))).not.toThrow();
    expect(() => assertCanEdit(editor, article({ publisherId: 5 }))).toThrow(PermissionError);
    expect(() => assertCanEdit(reader, article())).toThrow("Role 'reader' may not edit or delete content");
    expect(() => assertCanEdit(editor, published)).toThrow('Cannot modify article once it is approved');
  });

  it('hides unapproved items from readers only', () => {
    expect(() => assertCanView(reader, article())).toThrow('This article is not published yet');
    expect(() => assertCanView(reader, article({ status: ApprovalStatus.APPROVED }))).not.toThrow();
    expect(() => assertCanView(editor, article())).not.toThrow();
  });
});
