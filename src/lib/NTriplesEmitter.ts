import { finished } from 'stream/promises';
import type { Writable } from 'stream';
import type { Quad } from '@rdfjs/types';
import { describeError, WriteFailureError } from './errors';
import { formatTriple, SerializeOptions } from './ntriples';

export interface EmitterOptions extends SerializeOptions {
  /**
   * End the sink in `close()`. Set for files the converter opened itself;
   * left unset for process.stdout and other borrowed streams.
   */
  endSink?: boolean;
}

/**
 * Streams triples to a writable sink as N-Triples, one line per triple.
 *
 * Lines are written as they are produced and the emitter waits for `drain` whenever the sink
 * signals backpressure, so memory use does not grow with the size of the graph. The first
 * error the sink reports is raised as a WriteFailureError; lines already written are left
 * in place.
 */
export class NTriplesEmitter {
  private failure: Error | undefined;
  private written = 0;
  private closed = false;

  private readonly onError = (error: Error): void => {
    this.failure ??= error;
  };

  constructor(private readonly sink: Writable, private readonly options: EmitterOptions = {}) {
    sink.on('error', this.onError);
  }

  /** Number of triples handed to the sink so far. */
  get count(): number {
    return this.written;
  }

  async write(quads: Iterable<Quad>): Promise<void> {
    for (const quad of quads) {
      this.throwIfFailed();
      const accepted = this.sink.write(formatTriple(quad, this.options));
      this.written++;
      if (!accepted) {
        await this.drain();
      }
    }
    this.throwIfFailed();
  }

  /**
   * Ends the sink when the emitter owns it and waits until everything is flushed.
   * After a failure an owned sink is destroyed instead; the failure has already been raised.
   * Borrowed sinks keep the emitter's error listener, so a late error such as EPIPE on
   * stdout is recorded rather than thrown.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    if (!this.options.endSink) {
      return;
    }

    if (this.currentFailure() !== undefined) {
      // The listener stays attached: destroying may still report an error
      this.sink.destroy();
      return;
    }

    try {
      this.sink.end();
      await finished(this.sink);
    } catch (error) {
      throw this.writeFailure(error);
    } finally {
      this.sink.off('error', this.onError);
    }
  }

  private drain(): Promise<void> {
    return new Promise<void>(resolve => {
      const done = (): void => {
        this.sink.off('drain', done);
        this.sink.off('error', done);
        this.sink.off('close', done);
        resolve();
      };
      this.sink.on('drain', done);
      this.sink.on('error', done);
      this.sink.on('close', done);
    }).then(() => this.throwIfFailed());
  }

  private currentFailure(): Error | undefined {
    if (this.failure !== undefined) {
      return this.failure;
    }
    if (this.sink.errored) {
      return this.sink.errored;
    }
    if (this.sink.destroyed || this.sink.writableEnded) {
      return new Error('output stream is closed');
    }
    return undefined;
  }

  private throwIfFailed(): void {
    const failure = this.currentFailure();
    if (failure !== undefined) {
      throw this.writeFailure(failure);
    }
  }

  private writeFailure(error: unknown): WriteFailureError {
    return new WriteFailureError({
      message: `Failed to write N-Triples output: ${describeError(error)}`,
      cause: error,
      metadata: { triplesWritten: this.written },
    });
  }
}
