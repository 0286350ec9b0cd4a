import { v4 as uuidv4 } from 'uuid';
import { AppConfig } from '../config';
import {
  Editor,
  Journalist,
  Role,
  SocialConnection,
  User,
  hasRole
} from '../models/User';
import { ResetToken } from '../models/ResetToken';
import { DataStore, NewUser, StoreReader, Transaction } from '../storage/DataStore';
import {
  comparePassword,
  generateResetToken,
  generateToken,
  hashPassword,
  hashResetToken,
  verifyToken
} from '../utils/auth';
import { Clock } from '../utils/clock';
import {
  AppError,
  ConflictError,
  NotFoundError,
  PermissionError,
  UnauthorizedError,
  ValidationError
} from '../utils/errors';
import { AsyncTaskQueue, TaskType } from './asyncTaskQueue';
import { Action, requireEditor } from './permissionGuard';

export interface RegisterDTO {
  username: string;
  password: string;
  email: string;
  role: Role;
  firstName: string;
  lastName: string;
  affiliatedPublisherId: number | null;
}

export interface UpdateProfileDTO {
  email?: string;
  firstName?: string;
  lastName?: string;
  affiliatedPublisherId?: number | null;
}

export interface ConnectSocialDTO {
  handle: string;
  accessToken: string;
}

export interface AccountEmailDeps {
  queue: AsyncTaskQueue;
  siteUrl: string;
}

export const invalidResetToken = (): AppError =>
  new AppError('Reset link is invalid or has expired', 'INVALID_RESET_TOKEN', 400);

export class AccountService {
  constructor(
    private readonly store: DataStore,
    private readonly auth: AppConfig['auth'],
    private readonly clock: Clock,
    private readonly emails: AccountEmailDeps
  ) {}

  async register(dto: RegisterDTO): Promise<{ user: User; token: string }> {
    if (this.store.getUserByUsername(dto.username)) {
      throw new ConflictError('Username already taken', 'USER_EXISTS');
    }

    const hashedPassword = await hashPassword(dto.password, this.auth);

    const user = this.store.transaction((tx) => {
      // Checked again: another registration may have won while hashing.
      if (tx.getUserByUsername(dto.username)) {
        throw new ConflictError('Username already taken', 'USER_EXISTS');
      }
      return tx.insertUser(this.buildUser(tx, dto, hashedPassword));
    });

    console.log(`👤 Registered ${user.role} '${user.username}'`);
    return { user, token: this.issueToken(user) };
  }

  async login(username: string, password: string): Promise<{ user: User; token: string }> {
    const user = this.store.getUserByUsername(username);
    if (!user) {
      throw new UnauthorizedError('Invalid username or password', 'INVALID_CREDENTIALS');
    }

    const isValid = await comparePassword(password, user.password);
    if (!isValid) {
      throw new UnauthorizedError('Invalid username or password', 'INVALID_CREDENTIALS');
    }

    return { user, token: this.issueToken(user) };
  }

  issueToken(user: User): string {
    return generateToken({ id: user.id, username: user.username, role: user.role }, this.auth);
  }

  /** The token's subject must still exist with the same role. */
  resolveToken(token: string): User | null {
    const claims = verifyToken(token, this.auth);
    if (!claims) {
      return null;
    }
    const user = this.store.getUser(claims.id);
    if (!user || user.role !== claims.role) {
      return null;
    }
    return user;
  }

  updateProfile(tx: Transaction, user: User, dto: UpdateProfileDTO): User {
    const current = tx.getUser(user.id);
    if (!current) {
      throw new NotFoundError('User not found');
    }

    const base = {
      email: dto.email ?? current.email,
      firstName: dto.firstName ?? current.firstName,
      lastName: dto.lastName ?? current.lastName
    };

    if (dto.affiliatedPublisherId === undefined) {
      return tx.updateUser({ ...current, ...base });
    }
    if (!hasRole(current, Role.EDITOR)) {
      throw new PermissionError('Only editors can be affiliated with a publisher');
    }
    this.assertPublisherExists(tx, dto.affiliatedPublisherId);
    return tx.updateUser({ ...current, ...base, affiliatedPublisherId: dto.affiliatedPublisherId });
  }

  connectSocial(tx: Transaction, user: User, dto: ConnectSocialDTO): Editor {
    const editor = requireEditor(user, Action.MANAGE_SOCIAL);
    const connection: SocialConnection = {
      provider: 'x',
      handle: dto.handle.replace(/^@/, ''),
      accessToken: dto.accessToken,
      connectedAt: this.clock()
    };
    const updated: Editor = { ...editor, socialConnection: connection };
    tx.updateUser(updated);
    return updated;
  }

  disconnectSocial(tx: Transaction, user: User): void {
    const editor = requireEditor(user, Action.MANAGE_SOCIAL);
    tx.updateUser({ ...editor, socialConnection: null });
  }

  /**
   * Emails a single-use reset link when the username and email belong to the
   * same account. Unused links issued earlier for that account are revoked.
   * Returns nothing either way, so callers cannot tell whether it matched.
   */
  requestPasswordReset(username: string, email: string): void {
    const wanted = username.trim().toLowerCase();
    const user = this.store
      .listUsersByEmail(email)
      .find((candidate) => candidate.username.toLowerCase() === wanted);
    if (!user) {
      console.log('🔑 Password reset requested for an unknown account');
      return;
    }

    const { raw, hash } = generateResetToken();
    const ttlMinutes = this.auth.resetTokenTtlMinutes;
    const now = this.clock();

    this.store.transaction((tx) => {
      tx.listResetTokensOf(user.id)
        .filter((token) => token.usedAt === null)
        .forEach((token) => tx.deleteResetToken(token.id));

      const token = tx.insertResetToken({
        userId: user.id,
        tokenHash: hash,
        createdAt: now,
        expiresAt: new Date(now.getTime() + ttlMinutes * 60_000),
        usedAt: null
      });

      tx.afterCommit(() => {
        console.log(`🔑 Password reset link issued for '${user.username}'`);
        this.emails.queue.enqueue({
          id: `password-reset-${token.id}`,
          type: TaskType.SEND_ACCOUNT_EMAIL,
          payload: {
            purpose: 'password_reset',
            recipients: [user.email],
            subject: 'Password Reset Request',
            body: `Use the link below to reset your password. It expires in ${ttlMinutes} minutes and works once.`,
            reference: `${this.emails.siteUrl}/api/auth/password-reset/${raw}`
          }
        });
      });
    });
  }

  /** Checks a reset token without using it up. */
  checkResetToken(raw: string): boolean {
    return this.store.transaction((tx) => this.findUsableResetToken(tx, raw) !== null);
  }

  async resetPassword(raw: string, password: string): Promise<User> {
    if (!this.checkResetToken(raw)) {
      throw invalidResetToken();
    }

    const hashedPassword = await hashPassword(password, this.auth);

    const user = this.store.transaction((tx) => {
      // Checked again: the token may have been used while hashing.
      const token = this.findUsableResetToken(tx, raw);
      const current = token ? tx.getUser(token.userId) : undefined;
      if (!token || !current) {
        return null;
      }
      tx.updateResetToken({ ...token, usedAt: this.clock() });
      return tx.updateUser({ ...current, password: hashedPassword });
    });

    if (!user) {
      throw invalidResetToken();
    }
    console.log(`🔑 Password reset for '${user.username}'`);
    return user;
  }

  /** Emails every username registered with the address, if there are any. */
  remindUsername(email: string): void {
    const users = this.store.listUsersByEmail(email);
    if (users.length === 0) {
      console.log('📧 Username reminder requested for an unknown address');
      return;
    }

    this.emails.queue.enqueue({
      id: `username-reminder-${uuidv4()}`,
      type: TaskType.SEND_ACCOUNT_EMAIL,
      payload: {
        purpose: 'username_reminder',
        recipients: [users[0].email],
        subject: 'Your Username',
        body: `Your username(s): ${users.map((user) => user.username).join(', ')}`,
        reference: `${this.emails.siteUrl}/api/auth/login`
      }
    });
  }

  listJournalists(store: StoreReader): Journalist[] {
    return store
      .listUsersByRole(Role.JOURNALIST)
      .sort((a, b) => a.username.localeCompare(b.username));
  }

  getJournalist(store: StoreReader, id: number): Journalist {
    const user = store.getUser(id);
    if (!user || !hasRole(user, Role.JOURNALIST)) {
      throw new NotFoundError('Journalist not found');
    }
    return user;
  }

  private buildUser(tx: Transaction, dto: RegisterDTO, hashedPassword: string): NewUser {
    const base = {
      username: dto.username,
      email: dto.email,
      firstName: dto.firstName,
      lastName: dto.lastName,
      password: hashedPassword,
      createdAt: this.clock()
    };

    switch (dto.role) {
      case Role.READER:
      case Role.JOURNALIST:
        if (dto.affiliatedPublisherId !== null) {
          throw new ValidationError('Only editors can be affiliated with a publisher', {
            affiliated_publisher_id: 'Not allowed for this role'
          });
        }
        return dto.role === Role.READER ? { ...base, role: Role.READER } : { ...base, role: Role.JOURNALIST };
      case Role.EDITOR:
        this.assertPublisherExists(tx, dto.affiliatedPublisherId);
        return {
          ...base,
          role: Role.EDITOR,
          affiliatedPublisherId: dto.affiliatedPublisherId,
          socialConnection: null
        };
    }
  }

  // Expired tokens are deleted on sight.
  private findUsableResetToken(tx: Transaction, raw: string): ResetToken | null {
    const token = tx.findResetToken(hashResetToken(raw));
    if (!token || token.usedAt !== null) {
      return null;
    }
    if (this.clock().getTime() >= token.expiresAt.getTime()) {
      tx.deleteResetToken(token.id);
      return null;
    }
    return token;
  }

  private assertPublisherExists(store: StoreReader, publisherId: number | null): void {
    if (publisherId !== null && !store.getPublisher(publisherId)) {
      throw new NotFoundError('Publisher not found');
    }
  }
}
