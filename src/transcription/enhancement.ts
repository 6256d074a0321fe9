import { fetch } from 'undici';
import { z } from 'zod';
import { log } from '../log';

export interface Enhancement {
  /** False when there is no backend to call; the coordinator then skips enhancement. */
  readonly isConfigured: boolean;
  enhance(text: string, signal?: AbortSignal): Promise<string>;
}

export interface HttpEnhancementOptions {
  /** Base URL of an OpenAI-compatible API, e.g. http://127.0.0.1:11434/v1 */
  url?: string;
  apiKey?: string;
  model?: string;
  timeoutMs: number;
}

const SYSTEM_PROMPT = [
  'You clean up raw speech-to-text transcripts.',
  'Fix punctuation, capitalization and obvious recognition errors.',
  'Keep the wording and the language of the speaker. Return only the corrected transcript.',
].join(' ');

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }),
      }),
    )
    .min(1),
});

async function readResponseText(response: { text(): Promise<string> }): Promise<string> {
  try {
    return await response.text();
  } catch (error) {
    log.debug({ err: error, event: 'enhancement_body_unreadable' }, 'enhancement error body unreadable');
    return '';
  }
}

/** Chat-completions call that rewrites the transcript. */
export class HttpEnhancement implements Enhancement {
  constructor(private readonly options: HttpEnhancementOptions) {}

  get isConfigured(): boolean {
    return Boolean(this.options.url && this.options.model);
  }

  async enhance(text: string, signal?: AbortSignal): Promise<string> {
    const { url, model, apiKey, timeoutMs } = this.options;
    if (!url || !model) {
      throw new Error('enhancement is not configured');
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const headers: Record<string, string> = { 'Content-Type': 'application/json' };
      if (apiKey) {
        headers.Authorization = `Bearer ${apiKey}`;
      }
      const response = await fetch(`${url.replace(/\/+$/, '')}/chat/completions`, {
        method: 'POST',
        headers,
        body: JSON.stringify({
          model,
          temperature: 0.2,
          messages: [
            { role: 'system', content: SYSTEM_PROMPT },
            { role: 'user', content: text },
          ],
        }),
        signal: controller.signal,
      });

      if (!response.ok) {
        const body = await readResponseText(response);
        const preview = body.length > 500 ? `${body.slice(0, 500)}...` : body;
        throw new Error(`enhancement failed ${response.status}: ${preview}`);
      }

      const parsed = ChatCompletionSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new Error('enhancement response missing choices');
      }
      const enhanced = parsed.data.choices[0].message.content?.trim() ?? '';
      if (!enhanced) {
        throw new Error('enhancement response missing text');
      }
      return enhanced;
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}
