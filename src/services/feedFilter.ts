import { ApprovalStatus, ContentItem, ContentKind, byNewest } from '../models/Content';
import { Role, User } from '../models/User';
import { StoreReader } from '../storage/DataStore';
import { Action, assertAllowed } from './permissionGuard';

export const FEED_LIMIT = 10;

export interface CombinedFeed {
  articles: ContentItem[];
  newsletters: ContentItem[];
  totalArticles: number;
  totalNewsletters: number;
}

export type BrowseType = 'all' | 'articles' | 'newsletters';

/**
 * Visibility rules for content lists. Journalists and editors work the
 * pipeline and see every item; a reader sees approved items from the
 * publishers they subscribe to and the journalists they follow, and
 * nothing at all without subscriptions.
 */
export class FeedFilter {
  visible(store: StoreReader, user: User, kind: ContentKind): ContentItem[] {
    const items = store.listContent(kind);

    switch (user.role) {
      case Role.JOURNALIST:
      case Role.EDITOR:
        return items.sort(byNewest);
      case Role.READER: {
        const publishers = new Set(store.publishersOf(user.id));
        const journalists = new Set(store.journalistsOf(user.id));
        return items
          .filter(
            (item) =>
              item.status === ApprovalStatus.APPROVED &&
              ((item.publisherId !== null && publishers.has(item.publisherId)) ||
                journalists.has(item.authorId))
          )
          .sort(byNewest);
      }
    }
  }

  combined(store: StoreReader, user: User): CombinedFeed {
    const articles = this.visible(store, user, ContentKind.ARTICLE);
    const newsletters = this.visible(store, user, ContentKind.NEWSLETTER);

    return {
      articles: articles.slice(0, FEED_LIMIT),
      newsletters: newsletters.slice(0, FEED_LIMIT),
      totalArticles: articles.length,
      totalNewsletters: newsletters.length
    };
  }

  /** Every approved item, regardless of subscriptions. Readers only. */
  browse(store: StoreReader, user: User, type: BrowseType): ContentItem[] {
    assertAllowed(user, Action.BROWSE_APPROVED);

    const kinds: ContentKind[] =
      type === 'articles'
        ? [ContentKind.ARTICLE]
        : type === 'newsletters'
          ? [ContentKind.NEWSLETTER]
          : [ContentKind.ARTICLE, ContentKind.NEWSLETTER];

    return kinds
      .flatMap((kind) => store.listContent(kind))
      .filter((item) => item.status === ApprovalStatus.APPROVED)
      .sort(byNewest);
  }
}
