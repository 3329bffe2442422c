import { EventEmitter } from 'node:events';

export type QueueOptions = {
	concurrency: number;
};

export type AsyncFunction = () => Promise<void>;

/**
 * Runs queued async functions with at most `concurrency` of them in flight.
 */
export class Queue extends EventEmitter {
	private readonly q: AsyncFunction[] = [];
	private readonly failures: unknown[] = [];
	private activeFunctions = 0;
	private readonly concurrency: number;

	constructor(options: QueueOptions) {
		super();
		if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
			throw new Error(
				`Queue concurrency must be a positive integer, got ${options.concurrency}.`,
			);
		}
		this.concurrency = options.concurrency;
	}

	on(event: 'done', listener: () => void): this;
	// biome-ignore lint/suspicious/noExplicitAny: `any` matches parent EventEmitter method
	on(event: string | symbol, listener: (...arguments_: any[]) => void): this {
		return super.on(event, listener);
	}

	get active(): number {
		return this.activeFunctions;
	}

	get pending(): number {
		return this.q.length;
	}

	add(function_: AsyncFunction) {
		this.q.push(function_);
		this.tick();
	}

	/**
	 * Resolves once every queued function has settled. Rejects with the first
	 * failure if any function rejected.
	 */
	async onIdle() {
		if (this.isIdle()) {
			this.throwFirstFailure();
			return;
		}
		return new Promise<void>((resolve, reject) => {
			this.once('done', () => {
				if (this.failures.length > 0) {
					reject(this.failures[0]);
				} else {
					resolve();
				}
			});
		});
	}

	private isIdle() {
		return this.activeFunctions === 0 && this.q.length === 0;
	}

	private throwFirstFailure() {
		if (this.failures.length > 0) {
			throw this.failures[0];
		}
	}

	private tick() {
		while (this.activeFunctions < this.concurrency) {
			const item = this.q.shift();
			if (item === undefined) {
				break;
			}
			this.activeFunctions++;
			void item()
				.catch((error: unknown) => {
					this.failures.push(error);
				})
				.finally(() => {
					this.activeFunctions--;
					this.tick();
				});
		}

		if (this.isIdle()) {
			this.emit('done');
		}
	}
}
