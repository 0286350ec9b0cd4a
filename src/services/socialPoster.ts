import { z } from 'zod';
import { ContentItem, ContentKind, headlineOf, textOf } from '../models/Content';
import { errorMessage } from '../utils/errors';

export const MAX_POST_LENGTH = 280;

export interface SocialCredential {
  handle: string;
  accessToken: string;
}

export interface SocialMedia {
  buffer: Buffer;
  mimeType: string;
  fileName: string;
}

export type SocialPostResult =
  | { success: true; postId: string }
  | { success: false; error: string };

export interface SocialPoster {
  post(credential: SocialCredential, text: string, media?: SocialMedia): Promise<SocialPostResult>;
}

/** Cuts by code point, so the result never ends in half a surrogate pair. */
export const truncate = (text: string, max: number): string => {
  const chars = Array.from(text);
  if (chars.length <= max) {
    return text;
  }
  if (max <= 0) {
    return '';
  }
  return `${chars.slice(0, max - 1).join('').trimEnd()}…`;
};

/**
 * `📰 Author: Headline`, a blank line, the text, a blank line and the link.
 * Everything before the link is cut so the post fits in MAX_POST_LENGTH code points.
 */
export const composePost = (item: ContentItem, authorName: string, link: string): string => {
  const icon = item.kind === ContentKind.ARTICLE ? '📰' : '📣';
  const lead = `${icon} ${authorName}: ${headlineOf(item)}`;
  const text = textOf(item).trim();
  const footer = `\n\n${link}`;

  const main = text ? `${lead}\n\n${text}` : lead;
  return `${truncate(main, MAX_POST_LENGTH - Array.from(footer).length)}${footer}`;
};

const apiEnvelopeSchema = z.object({
  data: z.object({ id: z.string().min(1) }).optional(),
  detail: z.string().optional()
});

const readId = async (response: Response, label: string): Promise<string> => {
  const body: unknown = await response.json().catch(() => ({}));
  const parsed = apiEnvelopeSchema.safeParse(body);
  const payload: z.output<typeof apiEnvelopeSchema> = parsed.success ? parsed.data : {};

  if (!response.ok) {
    throw new Error(`${label} failed: ${response.status} ${payload.detail ?? response.statusText}`);
  }
  if (!payload.data) {
    throw new Error(`${label} returned no id`);
  }
  return payload.data.id;
};

/** Posts through the X v2 HTTP API with a user access token. */
export class XSocialPoster implements SocialPoster {
  constructor(
    private readonly apiBaseUrl: string,
    private readonly timeoutMs: number,
    private readonly fetchImpl: typeof fetch = fetch
  ) {}

  async post(credential: SocialCredential, text: string, media?: SocialMedia): Promise<SocialPostResult> {
    try {
      const mediaId = media ? await this.uploadMedia(credential, media) : undefined;

      const response = await this.fetchImpl(`${this.apiBaseUrl}/tweets`, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${credential.accessToken}`,
          'Content-Type': 'application/json'
        },
        body: JSON.stringify(mediaId ? { text, media: { media_ids: [mediaId] } } : { text }),
        signal: AbortSignal.timeout(this.timeoutMs)
      });

      const postId = await readId(response, 'Post');
      console.log(`🐦 Posted as @${credential.handle} (ID: ${postId})`);
      return { success: true, postId };
    } catch (error) {
      return { success: false, error: errorMessage(error) };
    }
  }

  private async uploadMedia(credential: SocialCredential, media: SocialMedia): Promise<string> {
    const form = new FormData();
    form.append('media', new Blob([media.buffer], { type: media.mimeType }), media.fileName);
    form.append('media_category', 'tweet_image');

    const response = await this.fetchImpl(`${this.apiBaseUrl}/media/upload`, {
      method: 'POST',
      headers: { Authorization: `Bearer ${credential.accessToken}` },
      body: form,
      signal: AbortSignal.timeout(this.timeoutMs)
    });
    return readId(response, 'Media upload');
  }
}
