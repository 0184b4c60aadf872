import { DEFAULT_BINDING_OPTIONS, type BindingOptions } from "../evidence/bind";
import { DEFAULT_POLICY_THRESHOLDS, type PolicyThresholds } from "../interventions/policy";
import type { Env } from "./env";

export type SupervisorConfig = {
  binding: BindingOptions;
  policy: PolicyThresholds;
  /** Trailing trace events handed to the intervention handler when a step passes none. */
  windowSize: number;
};

export const DEFAULT_SUPERVISOR_CONFIG: SupervisorConfig = {
  binding: DEFAULT_BINDING_OPTIONS,
  policy: DEFAULT_POLICY_THRESHOLDS,
  windowSize: 20
};

export function supervisorConfigFromEnv(e: Env): SupervisorConfig {
  return {
    binding: { threshold: e.SUPERVISOR_COVERAGE_THRESHOLD, topK: e.SUPERVISOR_TOP_K },
    policy: {
      escalateUncoveredHigh: e.SUPERVISOR_ESCALATE_UNCOVERED_HIGH,
      toolCallLimit: e.SUPERVISOR_TOOL_CALL_LIMIT,
      minEvidence: e.SUPERVISOR_MIN_EVIDENCE
    },
    windowSize: e.SUPERVISOR_WINDOW_SIZE
  };
}

export function mergeConfig(overrides: {
  binding?: Partial<BindingOptions>;
  policy?: Partial<PolicyThresholds>;
  windowSize?: number;
} = {}): SupervisorConfig {
  return {
    binding: { ...DEFAULT_SUPERVISOR_CONFIG.binding, ...overrides.binding },
    policy: { ...DEFAULT_SUPERVISOR_CONFIG.policy, ...overrides.policy },
    windowSize: overrides.windowSize ?? DEFAULT_SUPERVISOR_CONFIG.windowSize
  };
}
