/**
 * MEV protection modules
 */

export { computeCommitment, CommitRevealRegistry } from './commit-reveal';
export type { CommitmentInput, CommitRecord } from './commit-reveal';

export { AtomicExecutionGate, isBatchWindowActive, SESSION_ONLY_MODE } from './atomic-execution';

export {
  ProtectionGuard,
  ProtectionRegistry,
  PERMISSIVE_POLICY,
  NO_POOL_PROTECTION,
} from './protection-policy';
export type {
  PoolProtectionConfig,
  ProtectionFeature,
  ProtectionPolicy,
  ProtectionRequest,
} from './protection-policy';
