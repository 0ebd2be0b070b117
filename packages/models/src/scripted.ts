/**
 * @ace/models - Scripted client
 *
 * Deterministic CompletionClient for offline runs and tests. Answers come
 * either from a queue of canned responses or from a responder function;
 * every call is recorded.
 */

import type { CompletionClient, CompletionOptions, LlmResponse } from './provider.js';

export interface ScriptedCall {
  prompt: string;
  options: CompletionOptions;
}

/** A canned reply; an Error is thrown instead of returned. */
export type ScriptedReply = string | Error;

export type ScriptedResponder = (
  prompt: string,
  options: CompletionOptions,
  callIndex: number,
) => ScriptedReply | Promise<ScriptedReply>;

export interface ScriptedClientOptions {
  name?: string;
  model?: string;
  available?: boolean;
}

export class ScriptedClient implements CompletionClient {
  readonly name: string;
  readonly model: string;
  readonly calls: ScriptedCall[] = [];

  private readonly queue: ScriptedReply[] = [];
  private readonly responder: ScriptedResponder | undefined;
  private readonly available: boolean;

  constructor(script: ScriptedResponder | ScriptedReply[] = [], options: ScriptedClientOptions = {}) {
    if (typeof script === 'function') {
      this.responder = script;
    } else {
      this.queue.push(...script);
    }
    this.name = options.name ?? 'scripted';
    this.model = options.model ?? 'scripted';
    this.available = options.available ?? true;
  }

  /** Append canned replies to the queue. */
  enqueue(...replies: ScriptedReply[]): this {
    this.queue.push(...replies);
    return this;
  }

  get remaining(): number {
    return this.queue.length;
  }

  async isAvailable(): Promise<boolean> {
    return this.available;
  }

  async complete(prompt: string, options: CompletionOptions = {}): Promise<LlmResponse> {
    const index = this.calls.length;
    this.calls.push({ prompt, options: { ...options } });

    const reply = await this.next(prompt, options, index);
    if (reply instanceof Error) throw reply;
    return { text: reply, model: this.model, provider: this.name };
  }

  /** Prompts of the recorded calls issued by `role`. */
  promptsFor(role: NonNullable<CompletionOptions['role']>): string[] {
    return this.calls.filter((call) => call.options.role === role).map((call) => call.prompt);
  }

  private async next(prompt: string, options: CompletionOptions, index: number): Promise<ScriptedReply> {
    if (this.responder) return this.responder(prompt, options, index);
    const reply = this.queue.shift();
    if (reply === undefined) {
      throw new Error(`ScriptedClient has no reply for call #${index + 1}`);
    }
    return reply;
  }
}
