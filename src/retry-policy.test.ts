import test from "node:test";
import assert from "node:assert/strict";
import {
  DEFAULT_FAILURE_POLICY,
  computeLaunchDecision,
  policyFromRetryableKinds,
} from "./control/retry-policy.js";
import { AttemptsExhaustedError, LaunchError } from "./errors.js";

test("retryable failure under budget requeues", () => {
  const decision = computeLaunchDecision({
    failure: new LaunchError("quota", "HTTP 429: slow down"),
    attempts: 1,
    maxAttempts: 3,
  });
  assert.equal(decision.action, "requeue");
  assert.equal(decision.message, "quota: HTTP 429: slow down");
});

test("non-retryable failure fails on the first attempt", () => {
  const decision = computeLaunchDecision({
    failure: new LaunchError("permission", "denied"),
    attempts: 1,
    maxAttempts: 3,
  });
  assert.equal(decision.action, "fail");
  assert.equal(decision.message, "permission: denied");
});

test("retryable failure at the budget fails as exhausted", () => {
  const decision = computeLaunchDecision({
    failure: new LaunchError("transient", "boom"),
    attempts: 3,
    maxAttempts: 3,
  });
  assert.equal(decision.action, "fail");
  assert.ok(decision.error instanceof AttemptsExhaustedError);
  assert.equal(decision.message, "attempts exhausted (3/3): transient: boom");
});

test("explicit retryable flag wins over the policy table", () => {
  assert.equal(
    computeLaunchDecision({ failure: new LaunchError("invalid", "x", true), attempts: 1, maxAttempts: 3 })
      .action,
    "requeue"
  );
  assert.equal(
    computeLaunchDecision({ failure: new LaunchError("transient", "x", false), attempts: 1, maxAttempts: 3 })
      .action,
    "fail"
  );
});

test("errors that are not LaunchError are treated as unknown", () => {
  const decision = computeLaunchDecision({ failure: new Error("kaput"), attempts: 1, maxAttempts: 3 });
  assert.equal(decision.action, "fail");
  assert.equal(decision.message, "unknown: kaput");
});

test("a custom policy can make timeouts retryable", () => {
  const policy = policyFromRetryableKinds(["timeout", " QUOTA "]);
  assert.equal(policy.timeout, true);
  assert.equal(policy.quota, true);
  assert.equal(policy.transient, false);
  assert.equal(DEFAULT_FAILURE_POLICY.timeout, false);

  const decision = computeLaunchDecision({
    failure: new LaunchError("timeout", "aborted"),
    attempts: 1,
    maxAttempts: 2,
    policy,
  });
  assert.equal(decision.action, "requeue");
  assert.throws(() => policyFromRetryableKinds(["nope"]), /unknown launch failure kind: nope/);
});
