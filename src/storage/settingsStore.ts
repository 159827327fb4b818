import { z } from "zod";
import type { JournalSettings } from "../types";
import type { StorageError } from "../domain/errors";
import { ok, type Result } from "../domain/result";
import { DEFAULT_SETTINGS } from "../utils/constants";
import { readTextFile, writeTextFileAtomic } from "./recordFile";

const settingsSchema = z.object({
  enableSync: z.boolean().default(DEFAULT_SETTINGS.enableSync),
  autoSync: z.boolean().default(DEFAULT_SETTINGS.autoSync),
});

export interface SettingsStore {
  get(): JournalSettings;
  update(patch: Partial<JournalSettings>): Result<JournalSettings, StorageError>;
}

function parseSettings(text: string): JournalSettings {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    console.warn("Settings file is malformed, using defaults:", error);
    return { ...DEFAULT_SETTINGS };
  }
  const parsed = settingsSchema.safeParse(json);
  if (!parsed.success) {
    console.warn("Settings file is invalid, using defaults:", parsed.error.message);
    return { ...DEFAULT_SETTINGS };
  }
  return parsed.data;
}

export function createSettingsStore(filePath: string): SettingsStore {
  const read = readTextFile(filePath);
  let settings: JournalSettings = { ...DEFAULT_SETTINGS };
  if (!read.ok) {
    console.warn("Failed to read settings, using defaults:", read.error.message);
  } else if (read.value !== null) {
    settings = parseSettings(read.value);
  }

  const update = (
    patch: Partial<JournalSettings>,
  ): Result<JournalSettings, StorageError> => {
    settings = { ...settings, ...patch };
    const saved = writeTextFileAtomic(
      filePath,
      `${JSON.stringify(settings, null, 2)}\n`,
    );
    if (!saved.ok) {
      console.error("Failed to save settings:", saved.error.message);
      return saved;
    }
    return ok({ ...settings });
  };

  return {
    get: () => ({ ...settings }),
    update,
  };
}
