import type { AirGap } from './airgap.js';
import { Chunks } from './codec/index.js';
import { DecodeError } from './errors.js';
import type { Message, MessageHandler, ReceiveProgress, Unsubscribe } from './types.js';

/**
 * Scan session for one incoming message: feeds frames into a reassembly
 * buffer and decodes the envelope once the last chunk arrives.
 */
export class FrameReceiver {
  private readonly chunks = new Chunks();
  private readonly messageHandlers: Set<MessageHandler> = new Set();
  private decoded: Message | null = null;

  constructor(private readonly airGap: AirGap) {}

  /**
   * Accept one scanned frame.
   * Frame errors leave the session untouched; decode errors surface on the
   * push that completes the message. After such an error, call message() to
   * retry the decode (e.g. once the context's cipher or version is fixed).
   */
  push(frame: string): ReceiveProgress {
    const added = this.chunks.readChunk(frame);

    if (added && this.chunks.isComplete() && !this.decoded) {
      this.message();
    }

    return { ...this.progress(), added };
  }

  progress(): Omit<ReceiveProgress, 'added'> {
    return {
      received: this.chunks.receivedCount(),
      total: this.chunks.getCount(),
      complete: this.chunks.isComplete(),
    };
  }

  isComplete(): boolean {
    return this.chunks.isComplete();
  }

  missingIndices(): number[] {
    return this.chunks.missingIndices();
  }

  /**
   * The decoded message. The first successful decode notifies handlers.
   * @throws DecodeError INCOMPLETE_MESSAGE before the last chunk arrived
   */
  message(): Message {
    if (this.decoded) {
      return this.decoded;
    }
    if (!this.chunks.isComplete()) {
      throw new DecodeError(
        'INCOMPLETE_MESSAGE',
        `Missing chunks: got ${this.chunks.receivedCount()}, expected ${this.chunks.getCount()}`
      );
    }
    const message = this.airGap.unmarshal(this.chunks.data());
    this.decoded = message;
    this.notifyHandlers(message);
    return message;
  }

  /**
   * Called once with the decoded message when reassembly completes
   */
  onMessage(handler: MessageHandler): Unsubscribe {
    this.messageHandlers.add(handler);
    return () => {
      this.messageHandlers.delete(handler);
    };
  }

  /**
   * Notify all message handlers
   */
  private notifyHandlers(message: Message): void {
    for (const handler of this.messageHandlers) {
      try {
        handler(message);
      } catch (error) {
        console.error('Error in message handler:', error);
      }
    }
  }
}
