import { Credential, type CredentialOptions } from "./credential.js";
import { ConfigurationError } from "./errors.js";
import type { RateClass } from "./types.js";

/**
 * Ordered set of credentials. Selection is deterministic first-ready in
 * insertion order: the first token is drained before the second is touched.
 */
export class CredentialPool {
	private readonly members: readonly Credential[];

	constructor(credentials: readonly Credential[]) {
		if (credentials.length === 0) {
			throw new ConfigurationError(
				"No GitHub API tokens configured. Provide at least one token."
			);
		}
		this.members = [...credentials];
	}

	static fromSecrets(
		secrets: readonly string[],
		options?: CredentialOptions
	): CredentialPool {
		return new CredentialPool(secrets.map((s) => new Credential(s, options)));
	}

	get size(): number {
		return this.members.length;
	}

	get credentials(): readonly Credential[] {
		return this.members;
	}

	pickReady(
		rateClass: RateClass,
		now: number,
		exclude?: ReadonlySet<Credential>
	): Credential | null {
		for (const credential of this.members) {
			if (exclude?.has(credential)) continue;
			if (credential.isReady(rateClass, now)) return credential;
		}
		return null;
	}

	/** Earliest moment a currently exhausted credential comes back; `now` if none is exhausted */
	earliestReadyAt(rateClass: RateClass, now: number): number {
		let earliest: number | null = null;
		for (const credential of this.members) {
			if (credential.isReady(rateClass, now)) continue;
			const at = credential.readyAt(rateClass, now);
			if (earliest === null || at < earliest) earliest = at;
		}
		return earliest ?? now;
	}
}
