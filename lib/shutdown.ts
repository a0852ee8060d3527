/**
 * Working directory teardown when the server process stops
 */

import { getFileStore } from '@/lib/storage/file-store';
import { getJobRegistry } from '@/lib/jobs/job-registry';

let registered = false;

export async function shutdown(signal: string): Promise<void> {
  console.log(`[Shutdown] Received ${signal}, cancelling jobs and removing working directory`);
  const registry = await getJobRegistry();
  await registry.cancelAll();
  const store = await getFileStore();
  await store.teardown();
}

export function registerShutdownHooks(): void {
  if (registered) return;
  registered = true;

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal)
        .catch((error) => {
          console.error('[Shutdown] Cleanup failed:', error);
        })
        .finally(() => process.exit(0));
    });
  }
}
