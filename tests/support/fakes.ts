import pino from 'pino';
import type { FollowUpContext, FollowUpGenerator } from '../../src/domain/ai/dialogue';
import type { SentimentClassifier } from '../../src/domain/ai/sentiment';
import { ChannelSendError } from '../../src/shared/errors';
import type { ChatChannel, Clock, ReplyKeyboard } from '../../src/shared/types';

export const silentLogger = pino({ level: 'silent' });

export interface SentMessage {
  chatId: string;
  text: string;
  keyboard?: ReplyKeyboard;
}

export class FakeChannel implements ChatChannel {
  sent: SentMessage[] = [];
  failingChats = new Set<string>();

  async send(chatId: string, text: string, keyboard?: ReplyKeyboard): Promise<void> {
    if (this.failingChats.has(chatId)) {
      throw new ChannelSendError(chatId, 'chat not reachable');
    }
    this.sent.push({ chatId, text, keyboard });
  }

  textsTo(chatId: string): string[] {
    return this.sent.filter((m) => m.chatId === chatId).map((m) => m.text);
  }
}

/** Returns queued scores in order; an Error in the queue is thrown instead. */
export class FakeClassifier implements SentimentClassifier {
  calls: string[] = [];
  private queue: (number | Error)[] = [];

  enqueue(...results: (number | Error)[]): this {
    this.queue.push(...results);
    return this;
  }

  async classify(text: string): Promise<number> {
    this.calls.push(text);
    const next = this.queue.shift();
    if (next === undefined) return 0.5;
    if (next instanceof Error) throw next;
    return next;
  }
}

export class FakeGenerator implements FollowUpGenerator {
  contexts: FollowUpContext[] = [];
  failWith: Error | null = null;

  constructor(private question = 'What helped you most today?') {}

  async generateFollowUp(context: FollowUpContext): Promise<string> {
    this.contexts.push(context);
    if (this.failWith) throw this.failWith;
    return this.question;
  }
}

/** Clock fixed at `start` until moved with `set`. */
export function fixedClock(start: string): Clock & { set(iso: string): void } {
  let now = new Date(start);
  const clock = () => new Date(now.getTime());
  return Object.assign(clock, {
    set(iso: string) {
      now = new Date(iso);
    },
  });
}
