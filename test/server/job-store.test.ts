import assert from "node:assert/strict";
import { mkdir, readFile, writeFile } from "node:fs/promises";
import * as path from "node:path";
import { test } from "node:test";

import { JobStore } from "../../apps/server/src/jobs/job-store";
import { ErrorReporter } from "../../apps/server/src/notify/error-reporter";
import { createTempStore, makeJob, RecordingErrorReporter, StalledNotifier, waitFor } from "./support";

const storeWithStalledReports = (filePath: string) => {
  const notifier = new StalledNotifier();
  const reporter = new ErrorReporter();
  reporter.attach(notifier, "4242");
  return { notifier, store: new JobStore({ filePath, errorReporter: reporter }) };
};

test("JobStore: add then getByName returns the same fields without lastRunAt", async () => {
  const { store, cleanup } = await createTempStore();
  try {
    const job = makeJob({ name: "core switch", target: "192.0.2.1", intervalSec: 0.5, count: 20, scheduleMinutes: 15 });

    assert.equal(await store.add(job), true);
    const stored = await store.getByName("core switch");

    assert.deepEqual(stored, job);
    assert.equal(stored?.lastRunAt, undefined);
  } finally {
    await cleanup();
  }
});

test("JobStore: a missing file is created as an empty collection", async () => {
  const { store, filePath, cleanup } = await createTempStore();
  try {
    assert.deepEqual(await store.loadAll(), []);
    assert.deepEqual(JSON.parse(await readFile(filePath, "utf8")), { jobs: [] });
  } finally {
    await cleanup();
  }
});

test("JobStore: duplicate names are rejected without touching the collection", async () => {
  const { store, cleanup } = await createTempStore();
  try {
    await store.add(makeJob({ name: "edge-gw", target: "10.0.0.1" }));
    await store.add(makeJob({ name: "dns", target: "10.0.0.53" }));
    const before = await store.loadAll();

    assert.equal(await store.add(makeJob({ name: "edge-gw", target: "10.9.9.9" })), false);
    assert.deepEqual(await store.loadAll(), before);
  } finally {
    await cleanup();
  }
});

test("JobStore: deleting an unknown name returns false", async () => {
  const { store, cleanup } = await createTempStore();
  try {
    await store.add(makeJob());
    const before = await store.loadAll();

    assert.equal(await store.delete("ghost"), false);
    assert.deepEqual(await store.loadAll(), before);

    assert.equal(await store.delete("edge-gw"), true);
    assert.deepEqual(await store.loadAll(), []);
  } finally {
    await cleanup();
  }
});

test("JobStore: update merges only the given fields", async () => {
  const { store, cleanup } = await createTempStore();
  try {
    await store.add(makeJob());

    assert.equal(await store.update("edge-gw", { count: 50, lastRunAt: "2026-01-02T03:04:05.000Z" }), true);
    assert.equal(await store.update("ghost", { count: 1 }), false);

    assert.deepEqual(await store.getByName("edge-gw"), {
      name: "edge-gw",
      target: "10.0.0.1",
      intervalSec: 0.2,
      count: 50,
      scheduleMinutes: 5,
      lastRunAt: "2026-01-02T03:04:05.000Z"
    });
  } finally {
    await cleanup();
  }
});

test("JobStore: loadAll keeps insertion order", async () => {
  const { store, cleanup } = await createTempStore();
  try {
    for (const name of ["c", "a", "b"]) {
      await store.add(makeJob({ name }));
    }

    assert.deepEqual(
      (await store.loadAll()).map((job) => job.name),
      ["c", "a", "b"]
    );
  } finally {
    await cleanup();
  }
});

test("JobStore: concurrent adds are serialized", async () => {
  const { store, cleanup } = await createTempStore();
  try {
    const names = Array.from({ length: 20 }, (_, index) => `job-${index}`);
    const results = await Promise.all(names.map((name) => store.add(makeJob({ name }))));
    const sameName = await Promise.all([1, 2, 3, 4].map(() => store.add(makeJob({ name: "shared" }))));

    assert.ok(results.every(Boolean));
    assert.equal(sameName.filter(Boolean).length, 1);
    assert.equal((await store.loadAll()).length, 21);
  } finally {
    await cleanup();
  }
});

test("JobStore: unreadable document degrades to an empty list and is reported", async () => {
  const { store, filePath, reporter, cleanup } = await createTempStore();
  try {
    await writeFile(filePath, "{ not json", "utf8");

    assert.deepEqual(await store.loadAll(), []);
    assert.equal(reporter.reports.length, 1);
    assert.equal(reporter.reports[0].context, "job store: loadAll");
  } finally {
    await cleanup();
  }
});

test("JobStore: mutations refuse to overwrite an unreadable document", async () => {
  const { store, filePath, cleanup } = await createTempStore();
  try {
    await writeFile(filePath, "{ not json", "utf8");

    await assert.rejects(store.add(makeJob()));
    assert.equal(await readFile(filePath, "utf8"), "{ not json");
  } finally {
    await cleanup();
  }
});

test("JobStore: write failures propagate to the caller", async () => {
  const { filePath, cleanup } = await createTempStore();
  try {
    await writeFile(filePath, "{}", "utf8");
    const reporter = new RecordingErrorReporter();
    const blocked = new JobStore({ filePath: path.join(filePath, "nested", "jobs.json"), errorReporter: reporter });

    await assert.rejects(blocked.saveAll([makeJob()]));
    assert.equal(reporter.reports[0]?.context, "job store: write");
  } finally {
    await cleanup();
  }
});

test("JobStore: records missing fields fall back to defaults", async () => {
  const { store, filePath, cleanup } = await createTempStore();
  try {
    await writeFile(filePath, JSON.stringify({ jobs: [{ name: "legacy", target: "10.0.0.8", lastRunAt: null }] }), "utf8");

    assert.deepEqual(await store.loadAll(), [
      { name: "legacy", target: "10.0.0.8", intervalSec: 0.2, count: 10, scheduleMinutes: 5 }
    ]);
  } finally {
    await cleanup();
  }
});

test("JobStore: failing to create a missing file is reported once", async () => {
  const { store, filePath, reporter, cleanup } = await createTempStore();
  try {
    await mkdir(`${filePath}.tmp`);

    assert.deepEqual(await store.loadAll(), []);
    assert.deepEqual(
      reporter.reports.map((report) => report.context),
      ["job store: loadAll"]
    );
  } finally {
    await cleanup();
  }
});

test("JobStore: a stalled read-failure report does not hold up other operations", async () => {
  const { filePath, cleanup } = await createTempStore();
  try {
    await writeFile(filePath, "{ not json", "utf8");
    const { notifier, store } = storeWithStalledReports(filePath);

    const loading = store.loadAll();
    await waitFor(() => notifier.delivering === 1);

    await store.saveAll([makeJob()]);
    assert.deepEqual(await store.loadAll(), [makeJob()]);

    notifier.release.resolve(true);
    assert.deepEqual(await loading, []);
  } finally {
    await cleanup();
  }
});

test("JobStore: a stalled write-failure report does not hold up reads", async () => {
  const { filePath, cleanup } = await createTempStore();
  try {
    await writeFile(filePath, JSON.stringify({ jobs: [makeJob()] }), "utf8");
    await mkdir(`${filePath}.tmp`);
    const { notifier, store } = storeWithStalledReports(filePath);

    const saving = assert.rejects(store.saveAll([]));
    await waitFor(() => notifier.delivering === 1);

    assert.deepEqual(await store.loadAll(), [makeJob()]);

    notifier.release.resolve(true);
    await saving;
  } finally {
    await cleanup();
  }
});
