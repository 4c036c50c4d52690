import { parseRetryAfter } from './http-step-executor';

export const NOTION_API_URL = 'https://api.notion.com/v1';
export const NOTION_VERSION = '2022-06-28';

export class NotionApiError extends Error {
  constructor(
    readonly status: number,
    readonly body: string,
    readonly retryAfterMs?: number,
  ) {
    super(`Notion API responded ${status}: ${body.slice(0, 200)}`);
    this.name = 'NotionApiError';
  }
}

export type NotionClientConfig = {
  token: string;
  /** @default https://api.notion.com/v1 */
  baseUrl?: string;
};

/**
 * Minimal JSON client for the Notion REST API. Retrying is left to the callers, which already
 * retry with backoff.
 */
export class NotionClient {
  private readonly baseUrl: string;

  constructor(private readonly config: NotionClientConfig) {
    this.baseUrl = config.baseUrl ?? NOTION_API_URL;
  }

  async request(method: 'GET' | 'POST' | 'PATCH', path: string, body?: unknown): Promise<unknown> {
    const response = await fetch(`${this.baseUrl}${path}`, {
      method,
      headers: {
        Authorization: `Bearer ${this.config.token}`,
        'Notion-Version': NOTION_VERSION,
        'Content-Type': 'application/json',
      },
      body: body === undefined ? undefined : JSON.stringify(body),
    });

    if (!response.ok) {
      throw new NotionApiError(
        response.status,
        await response.text(),
        parseRetryAfter(response.headers.get('retry-after')),
      );
    }

    return response.json();
  }
}
