import { z } from 'zod';
import { ApprovalStatus } from '../models/Content';
import { Role } from '../models/User';
import { pageQuerySchema } from '../utils/pagination';

const id = z.coerce.number().int().positive();
const name = z.string().trim().max(150);
const password = z.string().min(8, 'Password must be at least 8 characters');
const email = z.string().trim().email();

// Auth
export const registerSchema = z.object({
  username: z.string().trim().min(1).max(150).regex(/^[\w.@+-]+$/, 'Letters, digits and @/./+/-/_ only'),
  password,
  email,
  role: z.nativeEnum(Role).default(Role.READER),
  first_name: name.default(''),
  last_name: name.default(''),
  affiliated_publisher_id: id.nullable().default(null)
});

export const credentialsSchema = z.object({
  username: z.string().min(1, 'Username is required'),
  password: z.string().min(1, 'Password is required')
});

export const passwordResetRequestSchema = z.object({
  username: z.string().trim().min(1, 'Username is required'),
  email
});

export const passwordResetSchema = z.object({ password });

export const forgotUsernameSchema = z.object({ email });

// Unknown keys, `role` included, are rejected: roles never change.
export const updateProfileSchema = z
  .object({
    email: email.optional(),
    first_name: name.optional(),
    last_name: name.optional(),
    affiliated_publisher_id: id.nullable().optional()
  })
  .strict();

// Content
const publisherRef = id.nullable().default(null);

export const createArticleSchema = z.object({
  title: z.string().trim().min(1, 'Title is required').max(255),
  body: z.string().trim().min(1, 'Body is required'),
  publisher_id: publisherRef,
  author_id: id.optional()
});

export const createNewsletterSchema = z.object({
  subject: z.string().trim().min(1, 'Subject is required').max(255),
  content: z.string().trim().min(1, 'Content is required'),
  publisher_id: publisherRef,
  author_id: id.optional()
});

const hasChanges = (data: object): boolean => Object.keys(data).length > 0;

export const updateArticleSchema = z
  .object({
    title: z.string().trim().min(1, 'Title is required').max(255).optional(),
    body: z.string().trim().min(1, 'Body is required').optional(),
    publisher_id: id.nullable().optional()
  })
  .strict()
  .refine(hasChanges, 'Nothing to update');

export const updateNewsletterSchema = z
  .object({
    subject: z.string().trim().min(1, 'Subject is required').max(255).optional(),
    content: z.string().trim().min(1, 'Content is required').optional(),
    publisher_id: id.nullable().optional()
  })
  .strict()
  .refine(hasChanges, 'Nothing to update');

export const contentListQuerySchema = pageQuerySchema.extend({
  status: z.nativeEnum(ApprovalStatus).optional()
});

export const browseQuerySchema = pageQuerySchema.extend({
  type: z.enum(['all', 'articles', 'newsletters']).default('all')
});

// Publishers
export const createPublisherSchema = z.object({
  name: z.string().trim().min(1, 'Name is required').max(255),
  description: z.string().trim().max(2000).optional()
});

// Subscriptions
export const subscriptionSchema = z.object({
  publisher_id: id.optional(),
  journalist_id: id.optional()
});

// Social
export const socialConnectionSchema = z.object({
  handle: z.string().trim().min(1).max(50),
  access_token: z.string().min(1, 'Access token is required')
});
