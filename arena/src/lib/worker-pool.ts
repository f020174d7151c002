import { Worker } from "node:worker_threads";

type WorkerRequest<TPayload> = { id: string; payload: TPayload };
type WorkerResponse<TResult> = { id: string; ok: true; result: TResult } | { id: string; ok: false; error: string };

type Handlers<TResult> = { resolve: (v: TResult) => void; reject: (e: Error) => void };

/** Fixed set of worker threads running TypeScript sources through tsx. */
export class WorkerPool<TPayload, TResult> {
  private readonly workers: Worker[];
  private readonly idle: Worker[];
  private readonly pending: Array<{ req: WorkerRequest<TPayload> } & Handlers<TResult>>;
  private readonly inflight: Map<string, Handlers<TResult> & { worker: Worker }>;
  private nextId: number;

  constructor(workerFileUrl: URL, size: number) {
    const resolvedSize = Math.max(1, Math.floor(size));
    this.workers = [];
    this.idle = [];
    this.pending = [];
    this.inflight = new Map();
    this.nextId = 0;
    for (let i = 0; i < resolvedSize; i += 1) {
      const worker = new Worker(workerFileUrl, { execArgv: ["--import", "tsx"], stdout: false, stderr: false });
      worker.on("message", (msg: WorkerResponse<TResult>) => this.onMessage(worker, msg));
      worker.on("error", (err: Error) => this.onError(worker, err));
      worker.on("exit", (code: number) => {
        if (code !== 0) {
          this.onError(worker, new Error(`worker exited with code ${code}`));
        }
      });
      this.workers.push(worker);
      this.idle.push(worker);
    }
  }

  public static matchWorkerUrl(): URL {
    return new URL("../worker/match-worker.ts", import.meta.url);
  }

  public run(payload: TPayload): Promise<TResult> {
    const id = `job-${this.nextId}`;
    this.nextId += 1;
    const req: WorkerRequest<TPayload> = { id, payload };
    return new Promise((resolvePromise, rejectPromise) => {
      this.pending.push({ req, resolve: resolvePromise, reject: rejectPromise });
      this.pump();
    });
  }

  public async close(): Promise<void> {
    await Promise.all(this.workers.map((w) => w.terminate()));
  }

  private pump(): void {
    while (this.idle.length > 0 && this.pending.length > 0) {
      const worker = this.idle.pop();
      const item = this.pending.shift();
      if (!worker || !item) {
        return;
      }
      this.inflight.set(item.req.id, { resolve: item.resolve, reject: item.reject, worker });
      worker.postMessage(item.req);
    }
  }

  private onMessage(worker: Worker, msg: WorkerResponse<TResult>): void {
    const handlers = this.inflight.get(msg.id);
    if (!handlers) {
      return;
    }
    this.inflight.delete(msg.id);
    this.idle.push(worker);
    this.pump();
    if (msg.ok) {
      handlers.resolve(msg.result);
    } else {
      handlers.reject(new Error(msg.error));
    }
  }

  private onError(worker: Worker, err: Error): void {
    for (const [id, handlers] of this.inflight.entries()) {
      if (handlers.worker === worker) {
        this.inflight.delete(id);
        handlers.reject(err);
      }
    }
    const idleIndex = this.idle.indexOf(worker);
    if (idleIndex >= 0) {
      this.idle.splice(idleIndex, 1);
    }
    const index = this.workers.indexOf(worker);
    if (index >= 0) {
      this.workers.splice(index, 1);
    }
    if (this.workers.length === 0) {
      for (const item of this.pending.splice(0)) {
        item.reject(new Error("no workers left in pool"));
      }
    }
  }
}
