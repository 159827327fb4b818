export type StorageError =
  | { type: "NotFound"; message: string }
  | { type: "Corrupt"; message: string }
  | { type: "Invalid"; message: string }
  | { type: "IO"; message: string }
  | { type: "Unknown"; message: string };

export type SyncError =
  | { type: "Disabled"; message: string }
  | { type: "NotSignedIn"; message: string }
  | { type: "Unavailable"; message: string }
  | { type: "Serialization"; message: string }
  | { type: "RemoteRejected"; message: string }
  | { type: "Unknown"; message: string };

export function describeError(error: unknown, fallback: string): string {
  if (typeof error === "object" && error !== null && "message" in error) {
    const { message } = error;
    if (typeof message === "string" && message) return message;
  }
  return fallback;
}
