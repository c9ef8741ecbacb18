/**
 * CLI: submit one case record read from stdin, JSONL events on stdout.
 *
 * Usage: cat case.json | npx tsx src/cli/run-case.ts
 *
 * Configuration comes from the environment (see src/schemas/config.schema.ts).
 * Without STORAGE_BASE_URL artifacts are written under RUNS_DIR/storage;
 * without CRM_BASE_URL notifications only appear in the event stream.
 */

import { join } from 'node:path';

import { getEnv, type Env } from '../config/env.js';
import { PlaywrightBrowserControl } from '../engines/playwright-control.js';
import { LoggingNotifier } from '../gateways/best-effort.js';
import { HttpClient } from '../gateways/http-client.js';
import { HttpNotificationGateway } from '../gateways/http-notification-gateway.js';
import { HttpObjectStorageGateway } from '../gateways/http-storage-gateway.js';
import { LocalObjectStorageGateway } from '../gateways/local-storage-gateway.js';
import type { NotificationGateway, ObjectStorageGateway } from '../gateways/types.js';
import type { EventLogger } from '../logging/run-logger.js';
import { loadSiteProfile } from '../profile/loader.js';
import { WorkflowRunner } from '../runner/workflow-runner.js';
import { errorMessage } from '../utils/timing.js';

// ── helpers ────────────────────────────────────────

function emit(event: Record<string, unknown>): void {
  process.stdout.write(JSON.stringify(event) + '\n');
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

const stdoutLogger: EventLogger = {
  async log(level, event, data = {}) {
    emit({ type: 'event', level, event, ...data });
  },
};

function storageFor(env: Env): ObjectStorageGateway {
  if (!env.STORAGE_BASE_URL) return new LocalObjectStorageGateway(join(env.RUNS_DIR, 'storage'));
  return new HttpObjectStorageGateway(
    new HttpClient({ baseUrl: env.STORAGE_BASE_URL, apiKey: env.STORAGE_API_KEY, defaultTimeoutMs: env.HTTP_TIMEOUT_MS }),
  );
}

function notifierFor(env: Env): NotificationGateway {
  if (!env.CRM_BASE_URL) return new LoggingNotifier(stdoutLogger);
  return new HttpNotificationGateway(
    new HttpClient({ baseUrl: env.CRM_BASE_URL, apiKey: env.CRM_API_KEY, defaultTimeoutMs: env.HTTP_TIMEOUT_MS }),
  );
}

// ── main ───────────────────────────────────────────

async function main(): Promise<void> {
  const env = getEnv();

  const raw = await readStdin();
  let input: unknown;
  try {
    input = JSON.parse(raw);
  } catch {
    emit({ type: 'run_error', error: 'Invalid JSON on stdin' });
    process.exitCode = 1;
    return;
  }

  const profile = await loadSiteProfile(env.SITE_PROFILE_PATH, { startUrl: env.START_URL });

  const runner = new WorkflowRunner({
    profile,
    storage: storageFor(env),
    notifier: notifierFor(env),
    launchBrowser: (staging) =>
      PlaywrightBrowserControl.launch({
        headless: env.HEADLESS,
        downloadDir: staging.dir,
        actionTimeoutMs: env.ACTION_TIMEOUT_MS,
        downloadTimeoutMs: env.DOWNLOAD_TIMEOUT_MS,
        executablePath: env.BROWSER_EXECUTABLE_PATH,
      }),
    runsDir: env.RUNS_DIR,
    timing: {
      actionRetries: env.ACTION_RETRIES,
      retryBackoffMs: env.RETRY_BACKOFF_MS,
      settleDelayMs: env.SETTLE_DELAY_MS,
      downloadTimeoutMs: env.DOWNLOAD_TIMEOUT_MS,
      downloadPollMs: env.DOWNLOAD_POLL_MS,
    },
    keepBrowserOpen: env.KEEP_BROWSER_OPEN,
    onLogEntry: (entry) => emit({ type: 'log', ...entry }),
  });

  // Enforce global timeout
  const result = await runner.runAutomation(input, { signal: AbortSignal.timeout(env.RUN_TIMEOUT_MS) });

  emit({ type: 'run_complete', ...result });
  if (!result.success) process.exitCode = 2;
}

main().catch((err: unknown) => {
  emit({ type: 'run_error', error: errorMessage(err) });
  process.exitCode = 1;
});
