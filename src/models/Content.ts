export enum ContentKind {
  ARTICLE = 'article',
  NEWSLETTER = 'newsletter'
}

export enum ApprovalStatus {
  PENDING = 'pending',
  APPROVED = 'approved',
  REJECTED = 'rejected'
}

export const APPROVAL_LABELS: Record<ApprovalStatus, string> = {
  [ApprovalStatus.PENDING]: 'Pending Approval',
  [ApprovalStatus.APPROVED]: 'Approved',
  [ApprovalStatus.REJECTED]: 'Rejected'
};

interface ContentBase {
  id: number;
  authorId: number;
  publisherId: number | null;
  status: ApprovalStatus;
  approvedBy: number | null; // set iff status is APPROVED
  rejectedBy: number | null; // set iff status is REJECTED
  imageId: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface Article extends ContentBase {
  kind: ContentKind.ARTICLE;
  title: string;
  body: string;
}

export interface Newsletter extends ContentBase {
  kind: ContentKind.NEWSLETTER;
  subject: string;
  content: string;
}

export type ContentItem = Article | Newsletter;

export interface CreateArticleDTO {
  title: string;
  body: string;
  publisherId: number | null;
}

export interface CreateNewsletterDTO {
  subject: string;
  content: string;
  publisherId: number | null;
}

export type CreateContentDTO =
  | ({ kind: ContentKind.ARTICLE } & CreateArticleDTO)
  | ({ kind: ContentKind.NEWSLETTER } & CreateNewsletterDTO);

/** Fields to change; `headline` and `text` map to title/body or subject/content. */
export interface UpdateContentDTO {
  headline?: string;
  text?: string;
  publisherId?: number | null;
}

export const headlineOf = (item: ContentItem): string => {
  switch (item.kind) {
    case ContentKind.ARTICLE:
      return item.title;
    case ContentKind.NEWSLETTER:
      return item.subject;
  }
};

export const textOf = (item: ContentItem): string => {
  switch (item.kind) {
    case ContentKind.ARTICLE:
      return item.body;
    case ContentKind.NEWSLETTER:
      return item.content;
  }
};

export const isApproved = (item: ContentItem): boolean =>
  item.status === ApprovalStatus.APPROVED;

/** URL segment used for a kind, e.g. `/api/articles/1/`. */
export const collectionOf = (kind: ContentKind): string => {
  switch (kind) {
    case ContentKind.ARTICLE:
      return 'articles';
    case ContentKind.NEWSLETTER:
      return 'newsletters';
  }
};

/** Newest first, ties broken by the later insertion. */
export const byNewest = (a: ContentItem, b: ContentItem): number =>
  b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id;
