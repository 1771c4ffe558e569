import { ConfigError } from "../../shared/errors.js";

export interface KeyedWorkerPoolConfig<K, J> {
	/** Maximum number of keys processed at the same time */
	readonly concurrency: number;
	readonly worker: (job: J, key: K) => Promise<void>;
	/** Called when the worker rejects; the pool moves on to the next job */
	readonly onError: (error: unknown, job: J, key: K) => void;
	/** Called once per queued job discarded by `shutdown()` */
	readonly onDropped?: (job: J, key: K) => void;
}

export interface ShutdownReport {
	readonly dropped: number;
	/** False when in-flight jobs were still running at the end of the grace period */
	readonly drained: boolean;
}

/**
 * Worker pool that runs jobs sharing a key strictly one after another, in
 * submission order, while distinct keys run concurrently up to `concurrency`.
 *
 * Keys are served round-robin: a key that just finished a job goes to the
 * back of the ready list.
 */
export class KeyedWorkerPool<K, J> {
	private readonly config: KeyedWorkerPoolConfig<K, J>;
	private readonly queues = new Map<K, J[]>();
	private readonly ready: K[] = [];
	private readonly running = new Set<K>();
	private idleWaiters: (() => void)[] = [];
	private closed = false;

	constructor(config: KeyedWorkerPoolConfig<K, J>) {
		if (!Number.isInteger(config.concurrency) || config.concurrency < 1) {
			throw new ConfigError("concurrency must be a positive integer", {
				concurrency: config.concurrency,
			});
		}
		this.config = config;
	}

	/** Number of jobs waiting to start. */
	get queued(): number {
		let total = 0;
		for (const jobs of this.queues.values()) total += jobs.length;
		return total;
	}

	/** Number of jobs currently running. */
	get active(): number {
		return this.running.size;
	}

	/** Queue a job behind earlier jobs for the same key. Returns false once shut down. */
	submit(key: K, job: J): boolean {
		if (this.closed) return false;
		const jobs = this.queues.get(key);
		if (jobs) {
			jobs.push(job);
		} else {
			this.queues.set(key, [job]);
			if (!this.running.has(key)) this.ready.push(key);
		}
		this.pump();
		return true;
	}

	/** Resolves once nothing is queued or running. */
	idle(): Promise<void> {
		if (this.isIdle()) return Promise.resolve();
		return new Promise((resolve) => {
			this.idleWaiters.push(resolve);
		});
	}

	/**
	 * Stop intake, drop every queued job, then wait up to `graceMs` for
	 * running jobs to finish.
	 */
	async shutdown(graceMs: number): Promise<ShutdownReport> {
		this.closed = true;
		let dropped = 0;
		for (const [key, jobs] of this.queues) {
			for (const job of jobs) {
				dropped++;
				this.config.onDropped?.(job, key);
			}
		}
		this.queues.clear();
		this.ready.length = 0;

		if (this.running.size === 0) {
			this.notifyIdle();
			return { dropped, drained: true };
		}

		let timer: ReturnType<typeof setTimeout> | undefined;
		const timedOut = new Promise<false>((resolve) => {
			timer = setTimeout(() => resolve(false), graceMs);
		});
		const drained = await Promise.race([this.idle().then(() => true), timedOut]);
		clearTimeout(timer);
		return { dropped, drained };
	}

	private isIdle(): boolean {
		return this.running.size === 0 && this.ready.length === 0;
	}

	private pump(): void {
		while (this.running.size < this.config.concurrency) {
			const key = this.ready.shift();
			if (key === undefined) return;
			const jobs = this.queues.get(key);
			const job = jobs?.shift();
			if (!jobs || job === undefined) continue;
			if (jobs.length === 0) this.queues.delete(key);
			this.running.add(key);
			void this.run(key, job);
		}
	}

	private async run(key: K, job: J): Promise<void> {
		try {
			await this.config.worker(job, key);
		} catch (error) {
			this.config.onError(error, job, key);
		} finally {
			this.running.delete(key);
			if (this.queues.has(key)) this.ready.push(key);
			this.pump();
			if (this.isIdle()) this.notifyIdle();
		}
	}

	private notifyIdle(): void {
		const waiters = this.idleWaiters;
		this.idleWaiters = [];
		for (const resolve of waiters) resolve();
	}
}
