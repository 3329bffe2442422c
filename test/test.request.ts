import { afterEach, describe, expect, it } from 'vitest';
import { getInsecureAgent, resetSharedAgents } from '../src/request.js';

describe('shared agents', () => {
	afterEach(async () => {
		await resetSharedAgents();
	});

	it('should reuse one insecure agent', () => {
		expect(getInsecureAgent()).toBe(getInsecureAgent());
	});

	it('should close the agent and start a new one after a reset', async () => {
		const first = getInsecureAgent();
		await resetSharedAgents();
		expect(first.closed).toBe(true);
		expect(getInsecureAgent()).not.toBe(first);
	});

	it('should reset without an agent', async () => {
		await expect(resetSharedAgents()).resolves.toBeUndefined();
	});
});
