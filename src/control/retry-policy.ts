import {
  AttemptsExhaustedError,
  LaunchError,
  errorMessage,
  type LaunchFailureKind,
} from "../errors.js";

/** Retryable flag per launch failure kind. */
export type FailurePolicy = Record<LaunchFailureKind, boolean>;

export const LAUNCH_FAILURE_KINDS: readonly LaunchFailureKind[] = [
  "permission",
  "not_found",
  "invalid",
  "quota",
  "transient",
  "timeout",
  "unknown",
];

// A timed-out submit may still have started the job, so it is not retried
// unless configured otherwise.
export const DEFAULT_FAILURE_POLICY: Readonly<FailurePolicy> = {
  permission: false,
  not_found: false,
  invalid: false,
  quota: true,
  transient: true,
  timeout: false,
  unknown: false,
};

function isFailureKind(value: string): value is LaunchFailureKind {
  return LAUNCH_FAILURE_KINDS.some((kind) => kind === value);
}

/** Builds a policy where exactly the listed kinds are retryable. */
export function policyFromRetryableKinds(kinds: string[]): FailurePolicy {
  const policy: FailurePolicy = {
    permission: false,
    not_found: false,
    invalid: false,
    quota: false,
    transient: false,
    timeout: false,
    unknown: false,
  };
  for (const raw of kinds) {
    const kind = raw.trim().toLowerCase();
    if (!kind) continue;
    if (!isFailureKind(kind)) throw new Error(`unknown launch failure kind: ${raw}`);
    policy[kind] = true;
  }
  return policy;
}

export function toLaunchError(err: unknown): LaunchError {
  if (err instanceof LaunchError) return err;
  return new LaunchError("unknown", errorMessage(err), undefined, err);
}

export function isRetryable(error: LaunchError, policy: Readonly<FailurePolicy>): boolean {
  return error.retryable ?? policy[error.kind];
}

export type LaunchDecision =
  | { action: "requeue"; error: LaunchError; message: string }
  | { action: "fail"; error: LaunchError | AttemptsExhaustedError; message: string };

export function computeLaunchDecision(input: {
  failure: unknown;
  attempts: number;
  maxAttempts: number;
  policy?: Readonly<FailurePolicy>;
}): LaunchDecision {
  const error = toLaunchError(input.failure);
  const policy = input.policy ?? DEFAULT_FAILURE_POLICY;
  const message = `${error.kind}: ${error.message}`;

  if (!isRetryable(error, policy)) {
    return { action: "fail", error, message };
  }

  if (input.attempts >= input.maxAttempts) {
    const exhausted = new AttemptsExhaustedError(input.attempts, error);
    return {
      action: "fail",
      error: exhausted,
      message: `attempts exhausted (${input.attempts}/${input.maxAttempts}): ${message}`,
    };
  }

  return { action: "requeue", error, message };
}
