import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import type { Locator, ModelSuggester, PageHandle } from '../types/index.js';
import { uniqueTexts } from '../healing/locator-text.js';
import { HttpClient, HttpClientError } from './http-client.js';

export interface SuggestLocatorRequest {
  requestId: string;
  locator: Locator;
  texts: string[];
  identifiers: string[];
}

const SuggestLocatorResponseSchema = z.object({
  requestId: z.string(),
  locator: z.string().nullable(),
  reason: z.string().optional(),
});

export type SuggestLocatorResponse = z.infer<typeof SuggestLocatorResponseSchema>;

const SUGGEST_DEFAULT_TIMEOUT_MS = 12000;

export interface HttpModelSuggesterOptions {
  timeoutMs?: number;
  /** Page context sent with each request is capped to keep prompts small. */
  maxTexts?: number;
  maxIdentifiers?: number;
}

/**
 * POST /suggest-locator wrapper with schema validation.
 */
export async function suggestLocator(
  client: HttpClient,
  request: SuggestLocatorRequest,
  timeoutMs: number = SUGGEST_DEFAULT_TIMEOUT_MS,
  signal?: AbortSignal,
): Promise<SuggestLocatorResponse> {
  const response = await client.post<unknown>(
    '/suggest-locator',
    {
      requestId: request.requestId,
      locator: request.locator,
      texts: request.texts,
      identifiers: request.identifiers,
    },
    request.requestId,
    timeoutMs,
    signal,
  );

  const parsed = SuggestLocatorResponseSchema.safeParse(response.data);
  if (!parsed.success) {
    throw new HttpClientError(
      `Invalid suggest-locator response: ${parsed.error.message}`,
      response.status,
      request.requestId,
    );
  }

  return parsed.data;
}

/** ModelSuggester backed by the suggestion service. */
export class HttpModelSuggester implements ModelSuggester {
  private timeoutMs: number;
  private maxTexts: number;
  private maxIdentifiers: number;

  constructor(
    private client: HttpClient,
    options: HttpModelSuggesterOptions = {},
  ) {
    this.timeoutMs = options.timeoutMs ?? SUGGEST_DEFAULT_TIMEOUT_MS;
    this.maxTexts = options.maxTexts ?? 200;
    this.maxIdentifiers = options.maxIdentifiers ?? 200;
  }

  async suggest(locator: Locator, page: PageHandle, signal: AbortSignal): Promise<Locator | null> {
    const [texts, identifiers] = await Promise.all([
      page.allText(signal),
      page.allIdentifiers(signal),
    ]);

    const response = await suggestLocator(
      this.client,
      {
        requestId: `suggest-${randomUUID()}`,
        locator,
        texts: uniqueTexts(texts).slice(0, this.maxTexts),
        identifiers: [...new Set(identifiers)].slice(0, this.maxIdentifiers),
      },
      this.timeoutMs,
      signal,
    );
    return response.locator;
  }
}
