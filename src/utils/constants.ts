export const DEFAULT_DATA_DIR = "tmp";
export const RECORDS_FILE_NAME = "dayRecords.json";
export const SETTINGS_FILE_NAME = "settings.json";

export const DEFAULT_SETTINGS = {
  enableSync: false,
  autoSync: true,
} as const;
