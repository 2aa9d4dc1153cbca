import { GENESIS_PREVIOUS_HASH, verifyBlockHash, type Block } from '@custody/core';
import { isValidChain } from '@custody/ledger';

/**
 * Decides whether a strictly longer candidate chain may replace the local one.
 */
export type AdoptionPolicy = (candidate: readonly Block[], local: readonly Block[]) => boolean;

/**
 * Built-in policy names
 */
export type AdoptionPolicyName = 'trust-longest' | 'validate-before-adopt';

export const ADOPTION_POLICY_NAMES: readonly AdoptionPolicyName[] = ['trust-longest', 'validate-before-adopt'];

/**
 * Accept any candidate longer than the local chain.
 */
export const trustLongest: AdoptionPolicy = (candidate, local) => candidate.length > local.length;

/**
 * Whether every block sits at its own index and genesis is sealed and
 * anchored at `"0"`.
 */
export function isWellFormedChain(blocks: readonly Block[]): boolean {
  const genesis = blocks[0];
  if (!genesis || genesis.previous_hash !== GENESIS_PREVIOUS_HASH || !verifyBlockHash(genesis)) {
    return false;
  }
  return blocks.every((block, i) => block.index === i);
}

/**
 * Accept a longer candidate only if it is well formed and its hash links hold.
 */
export const validateBeforeAdopt: AdoptionPolicy = (candidate, local) =>
  trustLongest(candidate, local) && isWellFormedChain(candidate) && isValidChain(candidate);

const POLICIES: Record<AdoptionPolicyName, AdoptionPolicy> = {
  'trust-longest': trustLongest,
  'validate-before-adopt': validateBeforeAdopt,
};

/**
 * Whether a string names a built-in policy.
 */
export function isAdoptionPolicyName(value: string): value is AdoptionPolicyName {
  return Object.hasOwn(POLICIES, value);
}

/**
 * Resolve a policy name or pass a custom policy through.
 */
export function resolveAdoptionPolicy(policy: AdoptionPolicyName | AdoptionPolicy): AdoptionPolicy {
  return typeof policy === 'function' ? policy : POLICIES[policy];
}
