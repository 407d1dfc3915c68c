import assert from "node:assert/strict";
import { test } from "node:test";

import { loadConfig, maskToken } from "../../apps/server/src/config";

test("loadConfig: defaults when nothing is set", () => {
  assert.deepEqual(loadConfig({}), {
    port: 8787,
    jobsFile: "data/jobs.json",
    defaultsFile: "data/defaults.json",
    telegramBotToken: undefined,
    adminUserId: undefined,
    pingCommand: "ping",
    defaults: { intervalSec: 0.2, count: 10 },
    tickIntervalMs: 10_000
  });
});

test("loadConfig: blank values count as unset and numbers are coerced", () => {
  const config = loadConfig({
    PORT: "9000",
    JOBS_FILE: "  ",
    PING_DEFAULT_INTERVAL: "0.5",
    PING_DEFAULT_COUNT: "",
    SCHEDULER_TICK_SECONDS: "30"
  });

  assert.equal(config.port, 9000);
  assert.equal(config.jobsFile, "data/jobs.json");
  assert.deepEqual(config.defaults, { intervalSec: 0.5, count: 10 });
  assert.equal(config.tickIntervalMs, 30_000);
});

test("loadConfig: telegram settings", () => {
  const config = loadConfig({ TELEGRAM_BOT_TOKEN: "test-token-value", ADMIN_USER_ID: "123456" });

  assert.equal(config.telegramBotToken, "test-token-value");
  assert.equal(config.adminUserId, "123456");
});

test("loadConfig: a token without a recipient is rejected", () => {
  assert.throws(() => loadConfig({ TELEGRAM_BOT_TOKEN: "test-token-value" }), /ADMIN_USER_ID is required/);
});

test("loadConfig: out of range values are listed", () => {
  assert.throws(
    () => loadConfig({ PING_DEFAULT_INTERVAL: "0", ADMIN_USER_ID: "abc" }),
    (error: unknown) => {
      assert.ok(error instanceof Error);
      assert.match(error.message, /PING_DEFAULT_INTERVAL/);
      assert.match(error.message, /ADMIN_USER_ID: ADMIN_USER_ID must be a numeric Telegram chat id/);
      return true;
    }
  );
});

test("maskToken: keeps four characters on each side", () => {
  assert.equal(maskToken("test-token-value"), "test...alue");
  assert.equal(maskToken("short"), "****");
  assert.equal(maskToken(undefined), "****");
});
