import { logger } from "../logger";

export interface InputRequest {
  id: string;
  prompt: string;
}

export type InputResponder = (request: InputRequest) => void;

interface PendingRequest {
  request: InputRequest;
  resolve: (value: string | null) => void;
}

/**
 * Request/response channel between the run task and whoever answers prompts
 * (CLI, UI). One responder at a time; requests wait without timeout and are
 * delivered when a responder attaches. A cancelled request resolves to null.
 */
export class InputChannel {
  private readonly pending = new Map<string, PendingRequest>();
  private responder: InputResponder | null = null;
  private seq = 0;

  request(prompt: string): Promise<string | null> {
    this.seq += 1;
    const request: InputRequest = { id: `input-${this.seq}`, prompt };

    return new Promise<string | null>((resolve) => {
      this.pending.set(request.id, { request, resolve });
      logger.debug(`[Input] Waiting for ${request.id}`, { prompt });
      if (this.responder) this.deliver(this.responder, request);
    });
  }

  /** Attaches the single responder. Returns a function that detaches it. */
  onRequest(responder: InputResponder): () => void {
    if (this.responder) {
      throw new Error("An input responder is already attached");
    }
    this.responder = responder;
    for (const { request } of [...this.pending.values()]) {
      this.deliver(responder, request);
    }
    return () => {
      if (this.responder === responder) this.responder = null;
    };
  }

  respond(id: string, value: string): boolean {
    return this.settle(id, value);
  }

  cancel(id: string): boolean {
    return this.settle(id, null);
  }

  pendingRequests(): InputRequest[] {
    return [...this.pending.values()].map(({ request }) => ({ ...request }));
  }

  private settle(id: string, value: string | null): boolean {
    const entry = this.pending.get(id);
    if (!entry) {
      logger.warn(`[Input] No pending request ${id}`);
      return false;
    }
    this.pending.delete(id);
    entry.resolve(value);
    return true;
  }

  private deliver(responder: InputResponder, request: InputRequest): void {
    try {
      responder(request);
    } catch (error) {
      logger.warn(`[Input] Responder error: ${error}`);
    }
  }
}
