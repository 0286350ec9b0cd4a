import { ApprovalStatus, Article, ContentKind, Newsletter } from '../../src/models/Content';
import { Publisher } from '../../src/models/Publisher';
import { Editor, Journalist, Reader, Role, User } from '../../src/models/User';
import { Services } from '../../src/container';

interface ContentOptions {
  authorId: number;
  publisherId?: number | null;
  status?: ApprovalStatus;
  approvedBy?: number | null;
}

/**
 * Writes fixtures straight into the store. Every record gets a timestamp one
 * minute after the previous one, so creation order is also newest-last order.
 */
export class Seeder {
  private tick = 0;

  constructor(private readonly services: Services) {}

  private at(): Date {
    this.tick += 1;
    return new Date(Date.UTC(2024, 0, 1) + this.tick * 60_000);
  }

  private base(username: string) {
    return {
      username,
      email: `${username}@example.com`,
      firstName: '',
      lastName: '',
      password: 'not-a-hash',
      createdAt: this.at()
    };
  }

  reader(username: string): Reader {
    const data = { ...this.base(username), role: Role.READER as const };
    return this.services.store.transaction((tx) => {
      const user = tx.insertUser(data);
      return { ...data, id: user.id };
    });
  }

  journalist(username: string, names: { firstName?: string; lastName?: string } = {}): Journalist {
    const data = { ...this.base(username), ...names, role: Role.JOURNALIST as const };
    return this.services.store.transaction((tx) => {
      const user = tx.insertUser(data);
      return { ...data, id: user.id };
    });
  }

  editor(username: string, affiliatedPublisherId: number | null = null): Editor {
    const data = {
      ...this.base(username),
      role: Role.EDITOR as const,
      affiliatedPublisherId,
      socialConnection: null
    };
    return this.services.store.transaction((tx) => {
      const user = tx.insertUser(data);
      return { ...data, id: user.id };
    });
  }

  publisher(name: string): Publisher {
    return this.services.store.transaction((tx) =>
      tx.insertPublisher({ name, description: '', createdAt: this.at() })
    );
  }

  subscribe(reader: Reader, publisher: Publisher): void {
    this.services.store.transaction((tx) => tx.subscribeToPublisher(reader.id, publisher.id));
  }

  follow(reader: Reader, journalist: Journalist): void {
    this.services.store.transaction((tx) => tx.followJournalist(reader.id, journalist.id));
  }

  article(title: string, options: ContentOptions): Article {
    const createdAt = this.at();
    const data = {
      kind: ContentKind.ARTICLE as const,
      title,
      body: `${title} body`,
      authorId: options.authorId,
      publisherId: options.publisherId ?? null,
      status: options.status ?? ApprovalStatus.PENDING,
      approvedBy: options.approvedBy ?? null,
      rejectedBy: null,
      imageId: null,
      createdAt,
      updatedAt: createdAt
    };
    return this.services.store.transaction((tx) => {
      const item = tx.insertContent(data);
      return { ...data, id: item.id };
    });
  }

  newsletter(subject: string, options: ContentOptions): Newsletter {
    const createdAt = this.at();
    const data = {
      kind: ContentKind.NEWSLETTER as const,
      subject,
      content: `${subject} content`,
      authorId: options.authorId,
      publisherId: options.publisherId ?? null,
      status: options.status ?? ApprovalStatus.PENDING,
      approvedBy: options.approvedBy ?? null,
      rejectedBy: null,
      imageId: null,
      createdAt,
      updatedAt: createdAt
    };
    return this.services.store.transaction((tx) => {
      const item = tx.insertContent(data);
      return { ...data, id: item.id };
    });
  }

  token(user: User): string {
    return this.services.accounts.issueToken(user);
  }
}
