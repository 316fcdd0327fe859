import type { MessageSink, PublishedValue } from './types.js';
import { log } from './log.js';

/**
 * Republishes a value under `{basetopic}/{key}` only when it differs from the last
 * value sent for that key. The first write for a key always goes out.
 */
export class ChangePublisher {
  private readonly published = new Map<string, PublishedValue>();

  constructor(private readonly sink: MessageSink, private readonly basetopic: string) {}

  publishIfChanged(key: string, value: PublishedValue): boolean {
    if (this.published.has(key) && this.published.get(key) === value) return false;
    const topic = `${this.basetopic}/${key}`;
    this.sink.publish(topic, value === null ? '' : String(value));
    this.published.set(key, value);
    log.debug(`published ${topic} = ${value}`);
    return true;
  }

  valueOf(key: string): PublishedValue | undefined {
    return this.published.get(key);
  }
}
