import { GroupEmptyError, WorkerError } from "@/lib/errors";
import type { ComputeRequest, ComputeRunner } from "@/lib/compute-runner";
import type { FeatureTable } from "@/lib/feature-table";
import type { LogRatioResult } from "@/lib/log-ratio-engine";
import { initRequestFor, resultFromMessage } from "@/lib/worker-messages";
import type { LogRatioErrorMessage, LogRatioMessage, LogRatioRequest } from "@/lib/worker-messages";
import { createLogger } from "@/lib/logger";

const log = createLogger("worker-client");

/** The part of the Worker API the client needs; a real `Worker` satisfies it. */
export interface WorkerLike {
  postMessage(message: LogRatioRequest): void;
  addEventListener(type: "message", listener: (event: MessageEvent<LogRatioMessage>) => void): void;
  addEventListener(type: "error" | "messageerror", listener: (event: Event) => void): void;
  terminate(): void;
}

interface PendingCompute {
  resolve: (result: LogRatioResult) => void;
  reject: (err: Error) => void;
}

function errorFromMessage(msg: LogRatioErrorMessage): Error {
  if (msg.kind === "GroupEmptyError") return new GroupEmptyError(msg.slot ?? "numerator", msg.message);
  return new WorkerError(msg.message);
}

function describeWorkerError(event: Event): string {
  if ("message" in event && typeof event.message === "string" && event.message) return event.message;
  return "no detail";
}

/**
 * Runs log-ratio computations in a worker. Responses are matched to requests
 * by generation, so they may arrive in any order.
 */
export class LogRatioWorkerClient {
  private readonly pending = new Map<number, PendingCompute>();
  private readonly sampleOrder: readonly string[];
  private readonly readyPromise: Promise<void>;
  private resolveReady: () => void = () => {};
  private rejectReady: (err: Error) => void = () => {};
  private failure: Error | null = null;
  private terminated = false;

  constructor(private readonly worker: WorkerLike, table: FeatureTable) {
    this.sampleOrder = table.sampleIds;
    this.readyPromise = new Promise<void>((resolve, reject) => {
      this.resolveReady = resolve;
      this.rejectReady = reject;
    });
    // Surfaced through run(); avoid an unhandled rejection when nobody awaits ready().
    this.readyPromise.catch((err: unknown) => log.warn("worker init failed", err));

    worker.addEventListener("message", (event) => this.handleMessage(event.data));
    worker.addEventListener("error", (event) => this.fail(`Log-ratio worker crashed: ${describeWorkerError(event)}`));
    worker.addEventListener("messageerror", () =>
      this.fail("Log-ratio worker sent a message that could not be deserialized"),
    );
    worker.postMessage(initRequestFor(table));
  }

  /** Resolves once the worker has loaded the table. */
  ready(): Promise<void> {
    return this.readyPromise;
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  readonly run: ComputeRunner = (request: ComputeRequest) => {
    if (this.terminated) return Promise.reject(new WorkerError("Log-ratio worker was terminated"));
    if (this.failure) return Promise.reject(this.failure);
    if (this.pending.has(request.generation)) {
      return Promise.reject(new WorkerError(`Generation ${request.generation} is already being computed`));
    }

    return new Promise<LogRatioResult>((resolve, reject) => {
      this.pending.set(request.generation, { resolve, reject });
      this.worker.postMessage({
        type: "compute",
        generation: request.generation,
        numeratorIds: [...request.numeratorIds],
        denominatorIds: [...request.denominatorIds],
      });
    });
  };

  terminate(): void {
    if (this.terminated) return;
    this.terminated = true;
    this.worker.terminate();
    this.rejectAll(new WorkerError("Log-ratio worker was terminated"));
  }

  private handleMessage(msg: LogRatioMessage): void {
    if (msg.type === "ready") {
      log.debug(`worker ready (${msg.sampleCount} samples)`);
      this.resolveReady();
      return;
    }

    const generation = msg.generation;
    if (generation === null) {
      this.fail(`Log-ratio worker failed to initialize: ${msg.type === "error" ? msg.message : "no detail"}`);
      return;
    }

    const entry = this.pending.get(generation);
    if (!entry) {
      log.debug(`ignoring response for unknown generation ${generation}`);
      return;
    }
    this.pending.delete(generation);

    if (msg.type === "result") entry.resolve(resultFromMessage(msg, this.sampleOrder));
    else entry.reject(errorFromMessage(msg));
  }

  /** The worker is unusable from here on: every outstanding and later run rejects. */
  private fail(message: string): void {
    if (this.failure || this.terminated) return;
    log.error(message);
    this.failure = new WorkerError(message);
    this.rejectReady(this.failure);
    this.rejectAll(this.failure);
  }

  private rejectAll(err: Error): void {
    for (const entry of this.pending.values()) entry.reject(err);
    this.pending.clear();
  }
}
