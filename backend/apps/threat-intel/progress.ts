import type { Request, Response } from 'express';
import type { Server as SocketIOServer } from 'socket.io';
import type { PipelineStage, ProgressEvent, ProgressPayload } from '@shared/types/progress';
import { log, errorMessage } from 'backend/utils/log';

const MAX_TRACKED_SESSIONS = 100;

type ProgressListener = (event: ProgressEvent) => void;

/**
 * Bounded, best-effort progress queue. Publishing never waits on listeners;
 * delivery happens on a later tick. When the queue is full the oldest
 * pending event is dropped.
 */
export class ProgressChannel {
  private queue: ProgressEvent[] = [];
  private listeners = new Set<ProgressListener>();
  private drainScheduled = false;
  private latest = new Map<string, ProgressEvent>();
  dropped = 0;

  constructor(private readonly capacity = 256) {}

  /** Returns false when an older event had to be dropped to make room. */
  publish(event: ProgressEvent): boolean {
    let accepted = true;
    if (this.queue.length >= this.capacity) {
      this.queue.shift();
      this.dropped++;
      accepted = false;
    }
    this.queue.push(event);
    this.latest.delete(event.sessionId);
    this.latest.set(event.sessionId, event);
    if (this.latest.size > MAX_TRACKED_SESSIONS) {
      const oldest = this.latest.keys().next();
      if (!oldest.done) this.latest.delete(oldest.value);
    }
    this.scheduleDrain();
    return accepted;
  }

  subscribe(listener: ProgressListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  latestFor(sessionId: string): ProgressEvent | undefined {
    return this.latest.get(sessionId);
  }

  pending(): number {
    return this.queue.length;
  }

  private scheduleDrain() {
    if (this.drainScheduled) return;
    this.drainScheduled = true;
    setImmediate(() => this.drain());
  }

  drain() {
    this.drainScheduled = false;
    const events = this.queue;
    this.queue = [];
    for (const event of events) {
      for (const listener of this.listeners) {
        try {
          listener(event);
        } catch (error) {
          log(`Progress listener failed: ${errorMessage(error)}`, 'progress', 'warn');
        }
      }
    }
  }
}

export function toProgressPayload(event: ProgressEvent): ProgressPayload {
  return {
    session_id: event.sessionId,
    stage: event.stage,
    status: event.status,
    progress_percent: event.progressPercent,
    timestamp: event.timestamp.toISOString(),
  };
}

export type ProgressReporter = (stage: PipelineStage, status: string, progressPercent: number) => void;

export function createProgressReporter(channel: ProgressChannel | null, sessionId: string): ProgressReporter {
  return (stage, status, progressPercent) => {
    channel?.publish({ sessionId, stage, status, progressPercent, timestamp: new Date() });
  };
}

// Socket.IO consumer: every event goes out as 'progress'
export function attachSocketConsumer(channel: ProgressChannel, io: SocketIOServer): () => void {
  return channel.subscribe((event) => {
    io.emit('progress', toProgressPayload(event));
  });
}

export function getProgressHandler(channel: ProgressChannel) {
  return (req: Request, res: Response) => {
    const event = channel.latestFor(req.params.sessionId);
    if (!event) {
      res.status(404).json({ success: false, message: 'No progress for session' });
      return;
    }
    res.json(toProgressPayload(event));
  };
}
