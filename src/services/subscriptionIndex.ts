import { Publisher } from '../models/Publisher';
import { Journalist, Reader, Role, hasRole } from '../models/User';
import { StoreReader, Transaction } from '../storage/DataStore';
import { NotFoundError, ValidationError } from '../utils/errors';

export type SubscriptionTarget =
  | { type: 'publisher'; id: number }
  | { type: 'journalist'; id: number };

export interface SubscriptionInput {
  publisherId?: number;
  journalistId?: number;
}

export interface Subscriptions {
  publishers: Publisher[];
  journalists: Journalist[];
}

export interface SubscriptionChange {
  target: SubscriptionTarget;
  name: string;
  changed: boolean;
}

/** Exactly one of the two ids must be supplied. */
export const toSubscriptionTarget = (input: SubscriptionInput): SubscriptionTarget => {
  const { publisherId, journalistId } = input;

  if (publisherId !== undefined && journalistId !== undefined) {
    throw new ValidationError('Provide either publisher_id or journalist_id, not both');
  }
  if (publisherId !== undefined) {
    return { type: 'publisher', id: publisherId };
  }
  if (journalistId !== undefined) {
    return { type: 'journalist', id: journalistId };
  }
  throw new ValidationError('Must provide journalist_id or publisher_id');
};

const resolvePublisher = (store: StoreReader, id: number): Publisher => {
  const publisher = store.getPublisher(id);
  if (!publisher) {
    throw new NotFoundError('Publisher not found');
  }
  return publisher;
};

const resolveJournalist = (store: StoreReader, id: number): Journalist => {
  const user = store.getUser(id);
  if (!user || !hasRole(user, Role.JOURNALIST)) {
    throw new NotFoundError('Journalist not found');
  }
  return user;
};

export class SubscriptionIndex {
  subscribe(tx: Transaction, reader: Reader, target: SubscriptionTarget): SubscriptionChange {
    switch (target.type) {
      case 'publisher': {
        const publisher = resolvePublisher(tx, target.id);
        const changed = tx.subscribeToPublisher(reader.id, publisher.id);
        return { target, name: publisher.name, changed };
      }
      case 'journalist': {
        const journalist = resolveJournalist(tx, target.id);
        const changed = tx.followJournalist(reader.id, journalist.id);
        return { target, name: journalist.username, changed };
      }
    }
  }

  unsubscribe(tx: Transaction, reader: Reader, target: SubscriptionTarget): SubscriptionChange {
    switch (target.type) {
      case 'publisher': {
        const publisher = resolvePublisher(tx, target.id);
        const changed = tx.unsubscribeFromPublisher(reader.id, publisher.id);
        return { target, name: publisher.name, changed };
      }
      case 'journalist': {
        const journalist = resolveJournalist(tx, target.id);
        const changed = tx.unfollowJournalist(reader.id, journalist.id);
        return { target, name: journalist.username, changed };
      }
    }
  }

  list(store: StoreReader, reader: Reader): Subscriptions {
    const publishers = store
      .publishersOf(reader.id)
      .map((id) => store.getPublisher(id))
      .filter((publisher): publisher is Publisher => publisher !== undefined)
      .sort((a, b) => a.name.localeCompare(b.name));

    const journalists = store
      .journalistsOf(reader.id)
      .map((id) => store.getUser(id))
      .filter((user): user is Journalist => user !== undefined && hasRole(user, Role.JOURNALIST))
      .sort((a, b) => a.username.localeCompare(b.username));

    return { publishers, journalists };
  }

  /** Readers to notify when an item by `authorId` under `publisherId` is approved. */
  audienceOf(store: StoreReader, authorId: number, publisherId: number | null): Reader[] {
    const ids = new Set(store.followersOfJournalist(authorId));
    if (publisherId !== null) {
      store.subscribersOfPublisher(publisherId).forEach((id) => ids.add(id));
    }

    const readers: Reader[] = [];
    Array.from(ids)
      .sort((a, b) => a - b)
      .forEach((id) => {
        const user = store.getUser(id);
        if (user && hasRole(user, Role.READER)) {
          readers.push(user);
        }
      });
    return readers;
  }
}
