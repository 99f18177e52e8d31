/**
 * LogRatioWorkerClient against an in-process fake worker that runs the real
 * message handler, so requests can be answered in any order.
 */
import { describe, test, expect, vi, afterEach } from "vitest";
import { buildDataset } from "@/lib/dataset";
import { computeLogRatios } from "@/lib/log-ratio-engine";
import { LinkController } from "@/lib/link-controller";
import { LogRatioWorkerClient } from "@/lib/worker-client";
import type { WorkerLike } from "@/lib/worker-client";
import { createLogRatioMessageHandler } from "@/lib/worker-messages";
import type { LogRatioMessage, LogRatioRequest } from "@/lib/worker-messages";
import { loadSnapshot } from "./helpers";

const dataset = buildDataset(loadSnapshot());

class FakeWorker implements WorkerLike {
  readonly inbox: LogRatioRequest[] = [];
  terminated = false;
  private readonly listeners = new Map<string, (event: Event) => void>();
  private readonly handle = createLogRatioMessageHandler();

  /** When true, every posted message is answered on the next microtask. */
  constructor(private readonly auto = false) {}

  postMessage(message: LogRatioRequest): void {
    this.inbox.push(message);
    if (this.auto) queueMicrotask(() => this.process(this.inbox.indexOf(message)));
  }

  addEventListener(type: string, listener: (event: Event) => void): void {
    this.listeners.set(type, listener);
  }

  terminate(): void {
    this.terminated = true;
  }

  /** Answer the queued request at `index`. */
  process(index = 0): void {
    const [request] = this.inbox.splice(index, 1);
    this.respond(this.handle(request));
  }

  respond(message: LogRatioMessage): void {
    this.fire(new MessageEvent<LogRatioMessage>("message", { data: message }));
  }

  /** Raise an uncaught error inside the worker, as a browser reports it. */
  crash(message: string): void {
    this.fire(Object.assign(new Event("error"), { message }));
  }

  fire(event: Event): void {
    this.listeners.get(event.type)?.(event);
  }
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("LogRatioWorkerClient", () => {
  test("sends the table once, then computes by feature ids", async () => {
    const worker = new FakeWorker();
    const client = new LogRatioWorkerClient(worker, dataset.table);
    expect(worker.inbox[0]).toEqual({
      type: "init",
      featureIds: ["f1", "f2", "f3", "f4", "f5"],
      sampleIds: ["S1", "S2", "S3", "S4"],
      counts: dataset.table.toEntries(),
    });
    worker.process();
    await client.ready();

    const pending = client.run({ generation: 1, numeratorIds: ["f1"], denominatorIds: ["f3"] });
    expect(worker.inbox).toEqual([{ type: "compute", generation: 1, numeratorIds: ["f1"], denominatorIds: ["f3"] }]);
    worker.process();
    await expect(pending).resolves.toEqual(computeLogRatios(["f1"], ["f3"], dataset.table));
  });

  test("responses are matched by generation when they arrive out of order", async () => {
    const worker = new FakeWorker();
    const client = new LogRatioWorkerClient(worker, dataset.table);
    const second = client.run({ generation: 2, numeratorIds: ["f1"], denominatorIds: ["f3"] });
    const third = client.run({ generation: 3, numeratorIds: ["f1"], denominatorIds: ["f4"] });
    expect(client.pendingCount).toBe(2);

    worker.process(0); // init
    worker.process(1); // generation 3
    worker.process(0); // generation 2

    await expect(third).resolves.toEqual(computeLogRatios(["f1"], ["f4"], dataset.table));
    await expect(second).resolves.toEqual(computeLogRatios(["f1"], ["f3"], dataset.table));
    expect(client.pendingCount).toBe(0);
  });

  test("an empty group comes back as GroupEmptyError with its slot", async () => {
    const worker = new FakeWorker();
    const client = new LogRatioWorkerClient(worker, dataset.table);
    worker.process();
    const pending = client.run({ generation: 4, numeratorIds: [], denominatorIds: ["f1"] });
    worker.process();
    await expect(pending).rejects.toMatchObject({
      kind: "GroupEmptyError",
      slot: "numerator",
      message: "The numerator group contains no features",
    });
  });

  test("a generation already in flight is refused", async () => {
    const client = new LogRatioWorkerClient(new FakeWorker(), dataset.table);
    const first = client.run({ generation: 5, numeratorIds: ["f1"], denominatorIds: ["f2"] });
    await expect(client.run({ generation: 5, numeratorIds: ["f1"], denominatorIds: ["f2"] })).rejects.toThrow(
      "Generation 5 is already being computed",
    );
    expect(client.pendingCount).toBe(1);
    client.terminate();
    await expect(first).rejects.toThrow("Log-ratio worker was terminated");
  });

  test("a failed init rejects ready() and every computation", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    const worker = new FakeWorker();
    const client = new LogRatioWorkerClient(worker, dataset.table);
    const pending = client.run({ generation: 1, numeratorIds: ["f1"], denominatorIds: ["f2"] });

    worker.respond({ type: "error", generation: null, kind: "SnapshotValidationError", message: "bad table" });

    const message = "Log-ratio worker failed to initialize: bad table";
    await expect(pending).rejects.toThrow(message);
    await expect(client.ready()).rejects.toThrow(message);
    await expect(client.run({ generation: 2, numeratorIds: ["f1"], denominatorIds: ["f2"] })).rejects.toThrow(message);
  });

  test("a worker crash rejects ready(), outstanding and later runs", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    const worker = new FakeWorker();
    const client = new LogRatioWorkerClient(worker, dataset.table);
    const pending = client.run({ generation: 1, numeratorIds: ["f1"], denominatorIds: ["f2"] });

    worker.crash("out of memory");

    const message = "Log-ratio worker crashed: out of memory";
    await expect(pending).rejects.toMatchObject({ kind: "WorkerError", message });
    await expect(client.ready()).rejects.toThrow(message);
    await expect(client.run({ generation: 2, numeratorIds: ["f1"], denominatorIds: ["f2"] })).rejects.toThrow(message);
    expect(client.pendingCount).toBe(0);
    expect(errorSpy).toHaveBeenCalledWith("[ERROR]", "[worker-client]", message);
  });

  test("a crash after init still rejects the computations in flight", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const worker = new FakeWorker();
    const client = new LogRatioWorkerClient(worker, dataset.table);
    worker.process();
    await client.ready();
    const pending = client.run({ generation: 1, numeratorIds: ["f1"], denominatorIds: ["f2"] });

    worker.fire(new Event("error"));
    await expect(pending).rejects.toThrow("Log-ratio worker crashed: no detail");
  });

  test("an undeserializable message fails the worker", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    const worker = new FakeWorker();
    const client = new LogRatioWorkerClient(worker, dataset.table);
    const pending = client.run({ generation: 1, numeratorIds: ["f1"], denominatorIds: ["f2"] });

    worker.fire(new Event("messageerror"));
    await expect(pending).rejects.toThrow("Log-ratio worker sent a message that could not be deserialized");
  });

  test("a crash during a computation moves the controller to Error and settles", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    const worker = new FakeWorker();
    const client = new LogRatioWorkerClient(worker, dataset.table);
    worker.process();
    const controller = new LinkController({ featureIndex: dataset.featureIndex, runner: client.run });
    controller.clickFeature("f1");
    controller.clickFeature("f3");

    worker.crash("boom");
    await controller.whenSettled();
    expect(controller.getSnapshot().lastPacket).toMatchObject({
      state: "Error",
      perSampleLogRatio: null,
      errorDetail: { kind: "WorkerError", message: "Log-ratio worker crashed: boom" },
    });
    expect(controller.getSnapshot().pendingGenerations).toEqual([]);
  });

  test("terminate stops the worker and rejects outstanding and later runs", async () => {
    const worker = new FakeWorker();
    const client = new LogRatioWorkerClient(worker, dataset.table);
    worker.process();
    const pending = client.run({ generation: 1, numeratorIds: ["f1"], denominatorIds: ["f2"] });

    client.terminate();
    expect(worker.terminated).toBe(true);
    await expect(pending).rejects.toMatchObject({ kind: "WorkerError", message: "Log-ratio worker was terminated" });
    await expect(client.run({ generation: 2, numeratorIds: ["f1"], denominatorIds: ["f2"] })).rejects.toThrow(
      "Log-ratio worker was terminated",
    );
  });

  test("drives a LinkController like the inline runner", async () => {
    const client = new LogRatioWorkerClient(new FakeWorker(true), dataset.table);
    const controller = new LinkController({ featureIndex: dataset.featureIndex, runner: client.run });
    controller.clickFeature("f1");
    controller.clickFeature("f3");
    await controller.whenSettled();

    const packet = controller.getSnapshot().lastPacket;
    expect(packet?.state).toBe("Ready");
    expect(packet?.perSampleLogRatio).toEqual({
      S1: Math.log(100) - Math.log(10),
      S2: Math.log(20) - Math.log(40),
      S3: "excluded",
      S4: "excluded",
    });
  });
});

describe("message handler", () => {
  test("a compute request before init is answered with a WorkerError", () => {
    const handle = createLogRatioMessageHandler();
    expect(handle({ type: "compute", generation: 1, numeratorIds: ["f1"], denominatorIds: ["f2"] })).toEqual({
      type: "error",
      generation: 1,
      kind: "WorkerError",
      message: "Log-ratio worker received a compute request before init",
    });
  });

  test("an invalid table is answered with an init error", () => {
    const handle = createLogRatioMessageHandler();
    expect(handle({ type: "init", featureIds: [], sampleIds: ["s1"], counts: [] })).toEqual({
      type: "error",
      generation: null,
      kind: "SnapshotValidationError",
      message: "Invalid dataset snapshot: table has no features",
    });
  });
});
