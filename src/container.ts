import { AppConfig } from './config';
import { AccountService } from './services/accountService';
import { ApprovalWorkflow } from './services/approvalWorkflow';
import { AsyncTaskQueue } from './services/asyncTaskQueue';
import { ContentService } from './services/contentService';
import { FeedFilter } from './services/feedFilter';
import { FileStorageService } from './services/fileStorage';
import { Notifier } from './services/notifier';
import { PublisherService } from './services/publisherService';
import { createSideEffectHandlers } from './services/sideEffects';
import { SocialPoster } from './services/socialPoster';
import { SubscriptionIndex } from './services/subscriptionIndex';
import { DataStore } from './storage/DataStore';
import { Clock, systemClock } from './utils/clock';

export interface AppDeps {
  config: AppConfig;
  notifier: Notifier;
  socialPoster: SocialPoster;
  clock?: Clock;
  store?: DataStore;
}

export interface Services {
  config: AppConfig;
  store: DataStore;
  queue: AsyncTaskQueue;
  files: FileStorageService;
  accounts: AccountService;
  publishers: PublisherService;
  content: ContentService;
  approvals: ApprovalWorkflow;
  subscriptions: SubscriptionIndex;
  feed: FeedFilter;
}

export const createServices = (deps: AppDeps): Services => {
  const { config } = deps;
  const clock = deps.clock ?? systemClock;
  const store = deps.store ?? new DataStore();

  const files = new FileStorageService(config.auth.jwtSecret, config.uploads.maxFileSize, () =>
    clock().getTime()
  );
  const subscriptions = new SubscriptionIndex();

  const queue = new AsyncTaskQueue(config.queue);
  queue.setHandlers(
    createSideEffectHandlers({
      store,
      notifier: deps.notifier,
      socialPoster: deps.socialPoster,
      fileStorage: files
    })
  );

  return {
    config,
    store,
    queue,
    files,
    accounts: new AccountService(store, config.auth, clock, { queue, siteUrl: config.siteUrl }),
    publishers: new PublisherService(clock),
    content: new ContentService(files, clock),
    approvals: new ApprovalWorkflow({ queue, subscriptions, clock, siteUrl: config.siteUrl }),
    subscriptions,
    feed: new FeedFilter()
  };
};
