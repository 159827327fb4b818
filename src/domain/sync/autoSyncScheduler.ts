export interface AutoSyncScheduler {
  startAutoSync: (intervalMs?: number) => void;
  stopAutoSync: () => void;
  isAutoSyncing: () => boolean;
  dispose: () => void;
}

export const DEFAULT_AUTO_SYNC_INTERVAL_MS = 5 * 60 * 1000;

export function createAutoSyncScheduler(
  dispatch: () => void,
): AutoSyncScheduler {
  let autoSyncTimer: NodeJS.Timeout | null = null;

  const stopAutoSync = () => {
    if (autoSyncTimer !== null) {
      clearInterval(autoSyncTimer);
      autoSyncTimer = null;
    }
  };

  const startAutoSync = (intervalMs = DEFAULT_AUTO_SYNC_INTERVAL_MS) => {
    stopAutoSync();
    autoSyncTimer = setInterval(dispatch, intervalMs);
    autoSyncTimer.unref();
  };

  return {
    startAutoSync,
    stopAutoSync,
    isAutoSyncing: () => autoSyncTimer !== null,
    dispose: stopAutoSync,
  };
}
