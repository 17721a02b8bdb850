import { Injectable, Logger } from '@nestjs/common';
import { AI_EMBED_MAX_CHARS, AI_PROVIDER } from '../config/intel.constants';
import { cleanText } from '../utils/text.util';

const RETRYABLE_STATUS = new Set([429, 500, 502, 503, 504]);

interface FetchJsonResult {
  ok: boolean;
  status: number;
  raw: string;
  json: Record<string, unknown> | null;
}

interface ProviderRequest {
  url: string;
  headers: Record<string, string>;
  body: unknown;
  timeoutMs: number;
}

@Injectable()
export class LlmClientService {
  private readonly logger = new Logger(LlmClientService.name);
  private readonly unavailableLogged = new Set<string>();

  async generateJson(
    systemPrompt: string,
    userPrompt: string,
  ): Promise<Record<string, unknown> | null> {
    const request =
      AI_PROVIDER === 'openai'
        ? this.openaiGenerateRequest(systemPrompt, userPrompt)
        : this.geminiGenerateRequest(systemPrompt, userPrompt);
    if (!request) {
      return null;
    }

    // At most one retry per call.
    const retriesRaw = Number(process.env.LLM_MAX_RETRIES ?? 1);
    const retries = Number.isFinite(retriesRaw)
      ? Math.min(1, Math.max(0, Math.floor(retriesRaw)))
      : 1;
    const backoffSec = Number(process.env.LLM_RETRY_BACKOFF_SEC ?? 1.5);

    for (let attempt = 1; attempt <= retries + 1; attempt += 1) {
      const response = await this.safeFetchJson(request);

      if (!response.ok) {
        if (RETRYABLE_STATUS.has(response.status) && attempt <= retries) {
          await this.sleep(backoffSec * 1000 * 2 ** (attempt - 1));
          continue;
        }
        this.logUnavailable(
          `${AI_PROVIDER}_generate_failed`,
          `${response.status} ${response.raw.slice(0, 180)}`,
        );
        return null;
      }

      const text =
        AI_PROVIDER === 'openai'
          ? this.extractOpenaiText(response.json)
          : this.extractGeminiText(response.json);
      const parsed = this.parseJsonObject(text);
      if (parsed) {
        return parsed;
      }

      if (attempt <= retries) {
        await this.sleep(backoffSec * 1000 * 2 ** (attempt - 1));
      }
    }

    this.logUnavailable(`${AI_PROVIDER}_json_parse_failed`);
    return null;
  }

  async getEmbedding(text: string): Promise<number[] | null> {
    const cleaned = cleanText(text || '');
    if (!cleaned) {
      return null;
    }

    const input = cleaned.slice(0, AI_EMBED_MAX_CHARS);
    const request =
      AI_PROVIDER === 'openai'
        ? this.openaiEmbeddingRequest(input)
        : this.geminiEmbeddingRequest(input);
    if (!request) {
      return null;
    }

    const response = await this.safeFetchJson(request);
    if (!response.ok) {
      this.logUnavailable(
        `${AI_PROVIDER}_embedding_failed`,
        `${response.status}`,
      );
      return null;
    }

    const values =
      AI_PROVIDER === 'openai'
        ? this.extractOpenaiEmbedding(response.json)
        : this.extractGeminiEmbedding(response.json);
    return values.length ? values : null;
  }

  private geminiGenerateRequest(
    systemPrompt: string,
    userPrompt: string,
  ): ProviderRequest | null {
    const apiKey = this.requireKey('GEMINI_API_KEY');
    if (!apiKey) {
      return null;
    }
    const model = process.env.GEMINI_MODEL ?? 'gemini-2.0-flash';
    return {
      url: `${this.geminiBase()}/models/${model}:generateContent`,
      headers: { 'x-goog-api-key': apiKey, 'Content-Type': 'application/json' },
      body: {
        contents: [{ role: 'user', parts: [{ text: userPrompt }] }],
        systemInstruction: { parts: [{ text: systemPrompt }] },
        generationConfig: {
          temperature: 0.1,
          maxOutputTokens: Number(process.env.GEMINI_MAX_OUTPUT_TOKENS ?? 8000),
          responseMimeType: 'application/json',
        },
      },
      timeoutMs: Number(process.env.LLM_TIMEOUT_SEC ?? 90) * 1000,
    };
  }

  private geminiEmbeddingRequest(text: string): ProviderRequest | null {
    const apiKey = this.requireKey('GEMINI_API_KEY');
    if (!apiKey) {
      return null;
    }
    const model = process.env.GEMINI_EMBEDDING_MODEL ?? 'gemini-embedding-001';
    return {
      url: `${this.geminiBase()}/models/${model}:embedContent`,
      headers: { 'x-goog-api-key': apiKey, 'Content-Type': 'application/json' },
      body: { model: `models/${model}`, content: { parts: [{ text }] } },
      timeoutMs: 30000,
    };
  }

  private openaiGenerateRequest(
    systemPrompt: string,
    userPrompt: string,
  ): ProviderRequest | null {
    const apiKey = this.requireKey('OPENAI_API_KEY');
    if (!apiKey) {
      return null;
    }
    return {
      url: `${this.openaiBase()}/chat/completions`,
      headers: {
        Authorization: `Bearer ${apiKey}`,
        'Content-Type': 'application/json',
      },
      body: {
        model: process.env.OPENAI_MODEL ?? 'gpt-4o-mini',
        response_format: { type: 'json_object' },
        messages: [
          { role: 'system', content: systemPrompt },
          { role: 'user', content: userPrompt },
        ],
        temperature: 0.1,
      },
      timeoutMs: Number(process.env.LLM_TIMEOUT_SEC ?? 90) * 1000,
    };
  }

  private openaiEmbeddingRequest(text: string): ProviderRequest | null {
    const apiKey = this.requireKey('OPENAI_API_KEY');
    if (!apiKey) {
      return null;
    }
    return {
      url: `${this.openaiBase()}/embeddings`,
      headers: {
        Authorization: `Bearer ${apiKey}`,
        'Content-Type': 'application/json',
      },
      body: {
        model: process.env.OPENAI_EMBEDDING_MODEL ?? 'text-embedding-3-small',
        input: text,
      },
      timeoutMs: 30000,
    };
  }

  private geminiBase(): string {
    return (
      process.env.GEMINI_API_BASE ??
      'https://generativelanguage.googleapis.com/v1beta'
    );
  }

  private openaiBase(): string {
    return process.env.OPENAI_API_BASE ?? 'https://api.openai.com/v1';
  }

  private requireKey(name: string): string | null {
    const apiKey = (process.env[name] ?? '').trim();
    if (!apiKey) {
      this.logUnavailable(`${name} not set`);
      return null;
    }
    return apiKey;
  }

  private extractGeminiText(json: unknown): string {
    const root = this.asRecord(json);
    const candidates = Array.isArray(root?.candidates) ? root.candidates : [];
    const firstCandidate = this.asRecord(candidates[0]);
    const content = this.asRecord(firstCandidate?.content);
    const parts = Array.isArray(content?.parts) ? content.parts : [];
    const firstPart = this.asRecord(parts[0]);
    return typeof firstPart?.text === 'string' ? firstPart.text : '';
  }

  private extractOpenaiText(json: unknown): string {
    const root = this.asRecord(json);
    const choices = Array.isArray(root?.choices) ? root.choices : [];
    const first = this.asRecord(choices[0]);
    const message = this.asRecord(first?.message);
    return typeof message?.content === 'string' ? message.content : '';
  }

  private extractGeminiEmbedding(json: unknown): number[] {
    const embedding = this.asRecord(this.asRecord(json)?.embedding);
    return this.numberArray(embedding?.values ?? embedding?.value);
  }

  private extractOpenaiEmbedding(json: unknown): number[] {
    const root = this.asRecord(json);
    const data = Array.isArray(root?.data) ? root.data : [];
    return this.numberArray(this.asRecord(data[0])?.embedding);
  }

  private numberArray(value: unknown): number[] {
    if (!Array.isArray(value)) {
      return [];
    }
    return value.filter((v): v is number => typeof v === 'number');
  }

  private parseJsonObject(text: string): Record<string, unknown> | null {
    if (!text) {
      return null;
    }
    const trimmed = text
      .trim()
      .replace(/```json/gi, '')
      .replace(/```/g, '')
      .trim();

    const direct = this.tryJsonParse(trimmed);
    if (direct) {
      return direct;
    }

    const block = this.extractJsonBlock(trimmed);
    if (!block) {
      return null;
    }

    return (
      this.tryJsonParse(block) ??
      this.tryJsonParse(block.replace(/,\s*([}\]])/g, '$1'))
    );
  }

  private tryJsonParse(value: string): Record<string, unknown> | null {
    try {
      const parsed: unknown = JSON.parse(value);
      return this.asRecord(parsed);
    } catch {
      return null;
    }
  }

  private extractJsonBlock(value: string): string | null {
    const start = value.indexOf('{');
    if (start === -1) {
      return null;
    }

    let depth = 0;
    for (let i = start; i < value.length; i += 1) {
      const ch = value[i];
      if (ch === '{') {
        depth += 1;
      } else if (ch === '}') {
        depth -= 1;
        if (depth === 0) {
          return value.slice(start, i + 1);
        }
      }
    }
    return null;
  }

  private asRecord(value: unknown): Record<string, unknown> | null {
    if (!value || typeof value !== 'object' || Array.isArray(value)) {
      return null;
    }
    return value as Record<string, unknown>;
  }

  private async safeFetchJson(request: ProviderRequest): Promise<FetchJsonResult> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), request.timeoutMs);

    try {
      const res = await fetch(request.url, {
        method: 'POST',
        headers: request.headers,
        body: JSON.stringify(request.body),
        signal: controller.signal,
      });
      const raw = await res.text();
      return {
        ok: res.ok,
        status: res.status,
        raw,
        json: this.tryJsonParse(raw),
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return { ok: false, status: 0, raw: message, json: null };
    } finally {
      clearTimeout(timeout);
    }
  }

  private logUnavailable(reason: string, detail?: string): void {
    if (this.unavailableLogged.has(reason)) {
      return;
    }
    this.unavailableLogged.add(reason);
    const detailText = cleanText(detail || '');
    if (detailText) {
      this.logger.warn(`AI unavailable: ${reason} (${detailText})`);
      return;
    }
    this.logger.warn(`AI unavailable: ${reason}`);
  }

  private async sleep(ms: number): Promise<void> {
    await new Promise((resolve) => {
      setTimeout(resolve, ms);
    });
  }
}
