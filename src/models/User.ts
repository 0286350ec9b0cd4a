export enum Role {
  READER = 'reader',
  JOURNALIST = 'journalist',
  EDITOR = 'editor'
}

export const ROLE_LABELS: Record<Role, string> = {
  [Role.READER]: 'Reader',
  [Role.JOURNALIST]: 'Journalist',
  [Role.EDITOR]: 'Editor'
};

export interface SocialConnection {
  provider: 'x';
  handle: string;
  accessToken: string;
  connectedAt: Date;
}

interface BaseUser {
  id: number;
  username: string;
  email: string;
  firstName: string;
  lastName: string;
  password: string; // hashed
  createdAt: Date;
}

// Subscriptions are not stored on the reader; see SubscriptionIndex.
export interface Reader extends BaseUser {
  role: Role.READER;
}

export interface Journalist extends BaseUser {
  role: Role.JOURNALIST;
}

export interface Editor extends BaseUser {
  role: Role.EDITOR;
  affiliatedPublisherId: number | null;
  socialConnection: SocialConnection | null;
}

export type User = Reader | Journalist | Editor;

export type UserOfRole<R extends Role> = Extract<User, { role: R }>;

export const hasRole = <R extends Role>(user: User, role: R): user is UserOfRole<R> =>
  user.role === role;

/** Claims carried inside a bearer token. */
export interface AuthUser {
  id: number;
  username: string;
  role: Role;
}

export const displayName = (user: User): string => {
  const fullName = `${user.firstName} ${user.lastName}`.trim();
  return fullName || user.username;
};
