import { ContentItem, ContentKind } from '../models/Content';
import { Publisher } from '../models/Publisher';
import { ResetToken } from '../models/ResetToken';
import { Role, User, UserOfRole, hasRole } from '../models/User';
import { JoinSet } from './JoinSet';

export type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

export type NewUser = DistributiveOmit<User, 'id'>;
export type NewContent = DistributiveOmit<ContentItem, 'id'>;

interface Tables {
  users: Map<number, User>;
  publishers: Map<number, Publisher>;
  content: Record<ContentKind, Map<number, ContentItem>>;
  resetTokens: Map<number, ResetToken>;
  // reader id -> publisher id
  publisherSubscriptions: JoinSet<number, number>;
  // reader id -> journalist id
  journalistFollows: JoinSet<number, number>;
  sequences: {
    user: number;
    publisher: number;
    content: Record<ContentKind, number>;
    resetToken: number;
  };
}

const emptyTables = (): Tables => ({
  users: new Map(),
  publishers: new Map(),
  content: {
    [ContentKind.ARTICLE]: new Map(),
    [ContentKind.NEWSLETTER]: new Map()
  },
  resetTokens: new Map(),
  publisherSubscriptions: new JoinSet(),
  journalistFollows: new JoinSet(),
  sequences: {
    user: 0,
    publisher: 0,
    content: {
      [ContentKind.ARTICLE]: 0,
      [ContentKind.NEWSLETTER]: 0
    },
    resetToken: 0
  }
});

/** Read operations shared by the store and by open transactions. */
export class StoreReader {
  constructor(protected readonly tables: Tables) {}

  // User operations
  getUser(id: number): User | undefined {
    return this.tables.users.get(id);
  }

  getUserByUsername(username: string): User | undefined {
    return Array.from(this.tables.users.values()).find(
      (user) => user.username === username
    );
  }

  /** Case-insensitive; several accounts may share one address. */
  listUsersByEmail(email: string): User[] {
    const wanted = email.trim().toLowerCase();
    return Array.from(this.tables.users.values()).filter(
      (user) => user.email.toLowerCase() === wanted
    );
  }

  listUsersByRole<R extends Role>(role: R): UserOfRole<R>[] {
    const users: UserOfRole<R>[] = [];
    this.tables.users.forEach((user) => {
      if (hasRole(user, role)) {
        users.push(user);
      }
    });
    return users;
  }

  // Publisher operations
  getPublisher(id: number): Publisher | undefined {
    return this.tables.publishers.get(id);
  }

  findPublisherByName(name: string): Publisher | undefined {
    const wanted = name.trim().toLowerCase();
    return Array.from(this.tables.publishers.values()).find(
      (publisher) => publisher.name.toLowerCase() === wanted
    );
  }

  listPublishers(): Publisher[] {
    return Array.from(this.tables.publishers.values());
  }

  // Content operations
  getContent(kind: ContentKind, id: number): ContentItem | undefined {
    return this.tables.content[kind].get(id);
  }

  listContent(kind: ContentKind): ContentItem[] {
    return Array.from(this.tables.content[kind].values());
  }

  // Reset token operations
  findResetToken(tokenHash: string): ResetToken | undefined {
    return Array.from(this.tables.resetTokens.values()).find(
      (token) => token.tokenHash === tokenHash
    );
  }

  listResetTokensOf(userId: number): ResetToken[] {
    return Array.from(this.tables.resetTokens.values()).filter((token) => token.userId === userId);
  }

  // Subscription operations
  publishersOf(readerId: number): number[] {
    return this.tables.publisherSubscriptions.rightsOf(readerId);
  }

  journalistsOf(readerId: number): number[] {
    return this.tables.journalistFollows.rightsOf(readerId);
  }

  subscribersOfPublisher(publisherId: number): number[] {
    return this.tables.publisherSubscriptions.leftsOf(publisherId);
  }

  followersOfJournalist(journalistId: number): number[] {
    return this.tables.journalistFollows.leftsOf(journalistId);
  }
}

/**
 * Write handle for one unit of work. Every mutation records how to undo
 * itself; hooks registered with `afterCommit` run only once the unit succeeds.
 */
export class Transaction extends StoreReader {
  private undoLog: Array<() => void> = [];
  private commitHooks: Array<() => void> = [];

  insertUser(data: NewUser): User {
    const user: User = { ...data, id: ++this.tables.sequences.user };
    this.tables.users.set(user.id, user);
    this.undoLog.push(() => this.tables.users.delete(user.id));
    return user;
  }

  updateUser(user: User): User {
    const previous = this.tables.users.get(user.id);
    if (!previous) {
      throw new Error(`Cannot update missing user ${user.id}`);
    }
    this.tables.users.set(user.id, user);
    this.undoLog.push(() => this.tables.users.set(previous.id, previous));
    return user;
  }

  insertPublisher(data: Omit<Publisher, 'id'>): Publisher {
    const publisher: Publisher = { ...data, id: ++this.tables.sequences.publisher };
    this.tables.publishers.set(publisher.id, publisher);
    this.undoLog.push(() => this.tables.publishers.delete(publisher.id));
    return publisher;
  }

  insertContent(data: NewContent): ContentItem {
    const table = this.tables.content[data.kind];
    const item: ContentItem = { ...data, id: ++this.tables.sequences.content[data.kind] };
    table.set(item.id, item);
    this.undoLog.push(() => table.delete(item.id));
    return item;
  }

  updateContent(item: ContentItem): ContentItem {
    const table = this.tables.content[item.kind];
    const previous = table.get(item.id);
    if (!previous) {
      throw new Error(`Cannot update missing ${item.kind} ${item.id}`);
    }
    table.set(item.id, item);
    this.undoLog.push(() => table.set(previous.id, previous));
    return item;
  }

  deleteContent(kind: ContentKind, id: number): boolean {
    const table = this.tables.content[kind];
    const previous = table.get(id);
    if (!previous) {
      return false;
    }
    table.delete(id);
    this.undoLog.push(() => table.set(previous.id, previous));
    return true;
  }

  insertResetToken(data: Omit<ResetToken, 'id'>): ResetToken {
    const token: ResetToken = { ...data, id: ++this.tables.sequences.resetToken };
    this.tables.resetTokens.set(token.id, token);
    this.undoLog.push(() => this.tables.resetTokens.delete(token.id));
    return token;
  }

  updateResetToken(token: ResetToken): ResetToken {
    const previous = this.tables.resetTokens.get(token.id);
    if (!previous) {
      throw new Error(`Cannot update missing reset token ${token.id}`);
    }
    this.tables.resetTokens.set(token.id, token);
    this.undoLog.push(() => this.tables.resetTokens.set(previous.id, previous));
    return token;
  }

  deleteResetToken(id: number): void {
    const previous = this.tables.resetTokens.get(id);
    if (!previous) {
      return;
    }
    this.tables.resetTokens.delete(id);
    this.undoLog.push(() => this.tables.resetTokens.set(previous.id, previous));
  }

  subscribeToPublisher(readerId: number, publisherId: number): boolean {
    return this.link(this.tables.publisherSubscriptions, readerId, publisherId);
  }

  unsubscribeFromPublisher(readerId: number, publisherId: number): boolean {
    return this.unlink(this.tables.publisherSubscriptions, readerId, publisherId);
  }

  followJournalist(readerId: number, journalistId: number): boolean {
    return this.link(this.tables.journalistFollows, readerId, journalistId);
  }

  unfollowJournalist(readerId: number, journalistId: number): boolean {
    return this.unlink(this.tables.journalistFollows, readerId, journalistId);
  }

  afterCommit(hook: () => void): void {
    this.commitHooks.push(hook);
  }

  /** @internal */
  rollback(): void {
    this.undoLog.splice(0).reverse().forEach((undo) => undo());
    this.commitHooks = [];
  }

  /** @internal */
  commit(): void {
    this.undoLog = [];
    this.commitHooks.splice(0).forEach((hook) => {
      try {
        hook();
      } catch (error) {
        console.error('❌ After-commit hook failed:', error);
      }
    });
  }

  private link(relation: JoinSet<number, number>, left: number, right: number): boolean {
    const added = relation.add(left, right);
    if (added) {
      this.undoLog.push(() => relation.remove(left, right));
    }
    return added;
  }

  private unlink(relation: JoinSet<number, number>, left: number, right: number): boolean {
    const removed = relation.remove(left, right);
    if (removed) {
      this.undoLog.push(() => relation.add(left, right));
    }
    return removed;
  }
}

/**
 * In-memory store. Transactions are synchronous, so two units of work can
 * never interleave: a transition that checks state and then writes it is
 * serialized against every other transaction.
 */
export class DataStore extends StoreReader {
  private inTransaction = false;

  constructor() {
    super(emptyTables());
  }

  transaction<T>(work: (tx: Transaction) => T): T {
    if (this.inTransaction) {
      throw new Error('Nested transactions are not supported');
    }

    const tx = new Transaction(this.tables);
    this.inTransaction = true;
    try {
      const result = work(tx);
      if (result instanceof Promise) {
        throw new Error('Transaction work must be synchronous');
      }
      this.inTransaction = false;
      tx.commit();
      return result;
    } catch (error) {
      tx.rollback();
      throw error;
    } finally {
      this.inTransaction = false;
    }
  }
}
