import { performance } from 'node:perf_hooks';

interface Segment {
	label: string;
	durationMs: number;
}

/**
 * Measures labeled segments of a multi-step operation.
 *
 * ```typescript
 * const sw = new Stopwatch('DocumentPipeline');
 * const chunks = await sw.time('chunk', () => chunkDocument());
 * sw.start('vectorize');
 * // ...
 * sw.stop();
 * console.debug(sw.toString());
 * ```
 */
export class Stopwatch {
	private readonly segments: Segment[] = [];
	private current: { label: string; startedAt: number } | null = null;
	private readonly createdAt = performance.now();

	constructor(private readonly name: string = 'Stopwatch') {}

	/**
	 * Start a new segment. A running segment is stopped first.
	 */
	start(label: string): void {
		if (this.current) {
			this.stop();
		}
		this.current = { label, startedAt: performance.now() };
	}

	/**
	 * Stop the running segment. No-op when nothing is running.
	 */
	stop(): void {
		if (!this.current) {
			return;
		}
		this.segments.push({
			label: this.current.label,
			durationMs: performance.now() - this.current.startedAt,
		});
		this.current = null;
	}

	/**
	 * Run `fn` as its own segment; the segment is closed even when `fn` throws.
	 */
	async time<T>(label: string, fn: () => Promise<T> | T): Promise<T> {
		this.start(label);
		try {
			return await fn();
		} finally {
			this.stop();
		}
	}

	/**
	 * Milliseconds since construction, including any running segment.
	 */
	elapsedMs(): number {
		return performance.now() - this.createdAt;
	}

	getSegments(): readonly Segment[] {
		return this.segments;
	}

	toString(): string {
		const lines = [`[${this.name}] Total: ${this.elapsedMs().toFixed(2)} ms`];
		for (const segment of this.segments) {
			lines.push(`  - ${segment.label}: ${segment.durationMs.toFixed(2)} ms`);
		}
		if (this.current) {
			const running = performance.now() - this.current.startedAt;
			lines.push(`  - ${this.current.label}: ${running.toFixed(2)} ms (running)`);
		}
		return lines.join('\n');
	}
}
