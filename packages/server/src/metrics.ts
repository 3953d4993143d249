// ---------------------------------------------------------------------------
// Prometheus-Compatible Metrics — counters, gauges, histograms
// ---------------------------------------------------------------------------

import type { PoolStats } from "./worker-pool";

/** Label set for a metric observation. */
export type Labels = Record<string, string>;

/** Shared per-label-set storage and text exposition for scalar metrics. */
abstract class ScalarMetric {
	protected readonly values = new Map<string, number>();
	protected abstract readonly type: "counter" | "gauge";

	constructor(
		readonly name: string,
		readonly help: string,
	) {}

	/** Return the current value for the given labels. */
	get(labels: Labels = {}): number {
		return this.values.get(labelKey(labels)) ?? 0;
	}

	reset(): void {
		this.values.clear();
	}

	/** Serialise to Prometheus text exposition format. */
	expose(): string {
		const lines = [`# HELP ${this.name} ${this.help}`, `# TYPE ${this.name} ${this.type}`];
		for (const [key, val] of this.values) {
			lines.push(`${this.name}${key} ${val}`);
		}
		return lines.join("\n");
	}

	protected add(labels: Labels, n: number): void {
		const key = labelKey(labels);
		this.values.set(key, (this.values.get(key) ?? 0) + n);
	}
}

/**
 * Monotonically increasing counter.
 *
 * @example
 * ```ts
 * const total = new Counter("switchyard_requests_total", "Dispatched requests");
 * total.inc({ status: "200" });
 * ```
 */
export class Counter extends ScalarMetric {
	protected readonly type = "counter";

	/** Increment the counter by `n` (default 1). */
	inc(labels: Labels = {}, n = 1): void {
		this.add(labels, n);
	}
}

/** Gauge that can go up and down. */
export class Gauge extends ScalarMetric {
	protected readonly type = "gauge";

	set(labels: Labels = {}, value = 0): void {
		this.values.set(labelKey(labels), value);
	}

	inc(labels: Labels = {}, n = 1): void {
		this.add(labels, n);
	}

	dec(labels: Labels = {}, n = 1): void {
		this.add(labels, -n);
	}
}

interface HistogramSeries {
	bucketCounts: number[];
	sum: number;
	count: number;
}

/** Histogram with cumulative `le` buckets plus `+Inf`. */
export class Histogram {
	private readonly data = new Map<string, HistogramSeries>();
	readonly buckets: readonly number[];

	constructor(
		readonly name: string,
		readonly help: string,
		buckets: number[],
	) {
		this.buckets = [...buckets].sort((a, b) => a - b);
	}

	observe(labels: Labels = {}, value = 0): void {
		const key = labelKey(labels);
		let series = this.data.get(key);
		if (!series) {
			series = { bucketCounts: this.buckets.map(() => 0).concat(0), sum: 0, count: 0 };
			this.data.set(key, series);
		}
		series.sum += value;
		series.count += 1;
		series.bucketCounts = series.bucketCounts.map((count, i) => {
			const bound = this.buckets[i];
			return bound === undefined || value <= bound ? count + 1 : count;
		});
	}

	getCount(labels: Labels = {}): number {
		return this.data.get(labelKey(labels))?.count ?? 0;
	}

	getSum(labels: Labels = {}): number {
		return this.data.get(labelKey(labels))?.sum ?? 0;
	}

	reset(): void {
		this.data.clear();
	}

	expose(): string {
		const lines = [`# HELP ${this.name} ${this.help}`, `# TYPE ${this.name} histogram`];

		for (const [key, series] of this.data) {
			const open = key === "" ? "{" : `${key.slice(0, -1)},`;
			const bounds = [...this.buckets.map(String), "+Inf"];
			bounds.forEach((le, i) => {
				lines.push(`${this.name}_bucket${open}le="${le}"} ${series.bucketCounts[i] ?? 0}`);
			});
			lines.push(`${this.name}_sum${key} ${series.sum}`);
			lines.push(`${this.name}_count${key} ${series.count}`);
		}

		return lines.join("\n");
	}
}

// ---------------------------------------------------------------------------
// Dispatch metrics
// ---------------------------------------------------------------------------

/**
 * Metrics recorded by the dispatcher. Also the sink handler faults are
 * reported to, alongside the logger.
 */
export class DispatchMetrics {
	readonly requestsTotal = new Counter(
		"switchyard_requests_total",
		"Dispatched requests by response status",
	);
	readonly handlerFaults = new Counter(
		"switchyard_handler_faults_total",
		"Middleware handlers that threw or rejected",
	);
	readonly rejectedTotal = new Counter(
		"switchyard_rejected_total",
		"Requests rejected before dispatch by reason",
	);
	readonly requestDuration = new Histogram(
		"switchyard_request_duration_ms",
		"Request handling time in milliseconds",
		[1, 5, 10, 50, 100, 500, 1000],
	);
	readonly queueDepth = new Gauge("switchyard_queue_depth", "Tasks waiting for a worker");
	readonly busyWorkers = new Gauge("switchyard_busy_workers", "Workers running a task");

	/** Copy worker pool state into the pool gauges. */
	samplePool(stats: PoolStats): void {
		this.queueDepth.set({}, stats.queued);
		this.busyWorkers.set({}, stats.busy);
	}

	/** Return the full Prometheus text exposition payload. */
	expose(): string {
		const sections = [
			this.requestsTotal.expose(),
			this.handlerFaults.expose(),
			this.rejectedTotal.expose(),
			this.requestDuration.expose(),
			this.queueDepth.expose(),
			this.busyWorkers.expose(),
		];
		return `${sections.join("\n\n")}\n`;
	}

	reset(): void {
		this.requestsTotal.reset();
		this.handlerFaults.reset();
		this.rejectedTotal.reset();
		this.requestDuration.reset();
		this.queueDepth.reset();
		this.busyWorkers.reset();
	}
}

/** Build a Prometheus label key like `{status="200"}`, escaping values. */
function labelKey(labels: Labels): string {
	const entries = Object.entries(labels);
	if (entries.length === 0) return "";
	const parts = entries
		.map(([k, v]) => `${k}="${v.replace(/\\/g, "\\\\").replace(/"/g, '\\"').replace(/\n/g, "\\n")}"`)
		.join(",");
	return `{${parts}}`;
}
