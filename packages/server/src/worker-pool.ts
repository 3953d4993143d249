// ---------------------------------------------------------------------------
// Worker Pool — fixed number of workers draining a shared task queue
// ---------------------------------------------------------------------------

import { Err, Ok, type Result, toError, UnavailableError } from "@switchyard/core";
import { errorFields, Logger } from "./logger";

/** A unit of work: one accepted connection's handling. */
export type Task = () => void | Promise<void>;

/** Worker pool configuration. */
export interface WorkerPoolConfig {
	/** Number of workers (default 4). Fixed for the pool's lifetime. */
	workers?: number;
	/** Maximum queued tasks before `execute` rejects (default unbounded). */
	maxQueue?: number;
	/** Called with the error of a task that threw or rejected. */
	onTaskError?: (error: Error) => void;
	/** Receives task failures (default: info-level stdout logger). */
	logger?: Logger;
}

/** Pool statistics. */
export interface PoolStats {
	workers: number;
	busy: number;
	queued: number;
	completed: number;
	failed: number;
}

/** Resolves a parked worker with its next task, or null when the pool closes. */
type Waiter = (task: Task | null) => void;

export const DEFAULT_WORKERS = 4;

/**
 * Fixed-size pool of workers.
 *
 * Each worker loops: take a task (parking while the queue is empty), run
 * it to completion, repeat. A task that throws is reported and counted but
 * never ends its worker, so the pool stays at its configured size until
 * {@link WorkerPool.close}. Ordering between tasks is not guaranteed.
 *
 * @example
 * ```ts
 * const pool = new WorkerPool({ workers: 4, maxQueue: 1000 });
 * const queued = pool.execute(() => handleConnection(req, res));
 * if (!queued.ok) reject(queued.error);
 * ```
 */
export class WorkerPool {
	readonly size: number;
	private readonly maxQueue: number;
	private readonly onTaskError?: (error: Error) => void;
	private readonly logger: Logger;

	private readonly queue: Task[] = [];
	private readonly parked: Waiter[] = [];
	private readonly loops: Promise<void>[] = [];
	private drainWaiters: Array<() => void> = [];

	private busy = 0;
	private pending = 0;
	private completed = 0;
	private failed = 0;
	private closed = false;

	constructor(config: WorkerPoolConfig = {}) {
		const workers = config.workers ?? DEFAULT_WORKERS;
		if (!Number.isInteger(workers) || workers < 1) {
			throw new RangeError(`Worker count must be a positive integer, got ${workers}`);
		}
		const maxQueue = config.maxQueue ?? Number.POSITIVE_INFINITY;
		if (maxQueue !== Number.POSITIVE_INFINITY && (!Number.isInteger(maxQueue) || maxQueue < 0)) {
			throw new RangeError(`maxQueue must be a non-negative integer, got ${maxQueue}`);
		}

		this.size = workers;
		this.maxQueue = maxQueue;
		this.onTaskError = config.onTaskError;
		this.logger = config.logger ?? new Logger("info", { component: "worker-pool" });

		for (let i = 0; i < workers; i++) {
			this.loops.push(this.work(i));
		}
	}

	/**
	 * Hand a task to the pool.
	 *
	 * Goes straight to a parked worker when one is free, otherwise joins the
	 * queue. Fails with {@link UnavailableError} when the queue is full or the
	 * pool is closed.
	 */
	execute(task: Task): Result<void, UnavailableError> {
		if (this.closed) {
			return Err(new UnavailableError("Worker pool is closed"));
		}

		const worker = this.parked.shift();
		if (worker) {
			this.pending++;
			worker(task);
			return Ok(undefined);
		}

		if (this.queue.length >= this.maxQueue) {
			return Err(new UnavailableError(`Worker pool queue is full (${this.maxQueue} tasks)`));
		}

		this.pending++;
		this.queue.push(task);
		return Ok(undefined);
	}

	stats(): PoolStats {
		return {
			workers: this.size,
			busy: this.busy,
			queued: this.queue.length,
			completed: this.completed,
			failed: this.failed,
		};
	}

	/** Resolves once every accepted task has finished. */
	drain(): Promise<void> {
		if (this.pending === 0) return Promise.resolve();
		return new Promise((resolve) => {
			this.drainWaiters.push(resolve);
		});
	}

	/**
	 * Stop accepting tasks. Already-queued tasks still run; resolves when
	 * every worker has exited.
	 */
	async close(): Promise<void> {
		this.closed = true;
		for (const worker of this.parked.splice(0)) {
			worker(null);
		}
		await Promise.all(this.loops);
	}

	// -----------------------------------------------------------------------
	// Internal
	// -----------------------------------------------------------------------

	private async work(id: number): Promise<void> {
		for (;;) {
			const task = await this.take();
			if (task === null) return;

			this.busy++;
			try {
				await task();
				this.completed++;
			} catch (err) {
				this.failed++;
				this.report(id, toError(err));
			} finally {
				this.busy--;
				this.pending--;
				if (this.pending === 0) this.notifyDrained();
			}
		}
	}

	private take(): Promise<Task | null> {
		const queued = this.queue.shift();
		if (queued) return Promise.resolve(queued);
		if (this.closed) return Promise.resolve(null);
		return new Promise((resolve) => {
			this.parked.push(resolve);
		});
	}

	private report(workerId: number, error: Error): void {
		this.logger.error("worker task failed", { workerId, ...errorFields(error) });
		if (!this.onTaskError) return;
		try {
			this.onTaskError(error);
		} catch (hookErr) {
			this.logger.error("task error hook failed", {
				workerId,
				...errorFields(toError(hookErr)),
			});
		}
	}

	private notifyDrained(): void {
		const waiters = this.drainWaiters;
		this.drainWaiters = [];
		for (const resolve of waiters) resolve();
	}
}
