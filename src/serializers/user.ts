import { ROLE_LABELS, Role, User } from '../models/User';
import { StoreReader } from '../storage/DataStore';

const affiliationOf = (store: StoreReader, user: User) => {
  if (user.role !== Role.EDITOR || user.affiliatedPublisherId === null) {
    return null;
  }
  const publisher = store.getPublisher(user.affiliatedPublisherId);
  return publisher ? { id: publisher.id, name: publisher.name } : null;
};

/** Public view of a user, safe to show to anyone signed in. */
export const serializeUser = (store: StoreReader, user: User) => ({
  id: user.id,
  username: user.username,
  first_name: user.firstName,
  last_name: user.lastName,
  role: user.role,
  role_display: ROLE_LABELS[user.role],
  affiliated_publisher: affiliationOf(store, user),
  date_joined: user.createdAt.toISOString()
});

/** The caller's own account. Never includes the password hash or a social token. */
export const serializeAccount = (store: StoreReader, user: User) => ({
  ...serializeUser(store, user),
  email: user.email,
  social_connection:
    user.role === Role.EDITOR && user.socialConnection
      ? {
          provider: user.socialConnection.provider,
          handle: user.socialConnection.handle,
          connected_at: user.socialConnection.connectedAt.toISOString()
        }
      : null
});
