import type { AssistantSpec, AssistantsApi } from '../ai/client.js';
import { fail, ok, type RemoteResult } from '../ai/result.js';

export interface SentMessage {
  threadId: string;
  content: string;
}

/**
 * In-process stand-in for the assistants API. Records every call and
 * answers from configurable handlers.
 */
export class FakeAssistantsApi implements AssistantsApi {
  readonly assistants: AssistantSpec[] = [];
  readonly threads: string[] = [];
  readonly messages: SentMessage[] = [];

  failAssistant = false;
  failThread = false;
  /** Return true to make the send for this content fail. */
  failMessage: (content: string) => boolean = () => false;
  reply: (content: string) => string = () => 'Happy to help.';
  /** Milliseconds every call waits before answering. */
  latencyMs = 0;

  private seq = 0;

  async createAssistant(spec: AssistantSpec): Promise<RemoteResult<string>> {
    await this.pause();
    this.assistants.push(spec);
    if (this.failAssistant) return fail('http', 'HTTP 502', 502);
    return ok(`asst-${++this.seq}`);
  }

  async createThread(assistantId: string): Promise<RemoteResult<string>> {
    await this.pause();
    this.threads.push(assistantId);
    if (this.failThread) return fail('network', 'connection reset');
    return ok(`thread-${++this.seq}`);
  }

  async sendMessage(threadId: string, content: string): Promise<RemoteResult<string>> {
    await this.pause();
    this.messages.push({ threadId, content });
    if (this.failMessage(content)) return fail('http', 'HTTP 500', 500);
    return ok(this.reply(content));
  }

  primingMessages(): SentMessage[] {
    return this.messages.filter((m) => m.content.startsWith('[User Profile]'));
  }

  private pause(): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, this.latencyMs));
  }
}
