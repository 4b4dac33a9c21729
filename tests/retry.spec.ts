import { isRetriableMediaError } from "../src/bot.js";
import { withRetry } from "../src/retry.js";
import { assert, assertDeepEqual, assertEqual } from "./helpers/assert.js";
import { test } from "./helpers/runner.js";

test("withRetry retries until success", async () => {
  let calls = 0;
  const seen: number[] = [];
  const result = await withRetry(
    async () => {
      calls += 1;
      if (calls < 3) throw new Error(`boom ${calls}`);
      return "done";
    },
    { attempts: 3, delayMs: 0, onError: (_err, attempt) => seen.push(attempt) }
  );
  assert(result.ok, "eventually succeeds");
  assertEqual(result.value, "done", "value");
  assertDeepEqual(seen, [1, 2], "failed attempts reported");
});

test("withRetry stops on non-retriable errors", async () => {
  let calls = 0;
  const result = await withRetry(
    async () => {
      calls += 1;
      throw new Error("400: Bad Request: WEBPAGE_CURL_FAILED");
    },
    { attempts: 3, delayMs: 0, retriable: isRetriableMediaError }
  );
  assert(!result.ok, "fails");
  assertEqual(calls, 1, "no retry");
  assert(result.error instanceof Error, "error kept");

  assert(isRetriableMediaError(new Error("ETIMEDOUT")), "timeouts are retried");
  assert(!isRetriableMediaError("FILE_REFERENCE_EXPIRED"), "stale file references are not");
});
