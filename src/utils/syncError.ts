import type { SyncError } from "../domain/errors";

export function formatSyncError(error: SyncError): string {
  switch (error.type) {
    case "Disabled":
      return "Sync disabled";
    case "NotSignedIn":
      return "Not signed in";
    case "Unavailable":
      return "Cloud unavailable";
    case "Serialization":
      return "Unreadable cloud record";
    case "RemoteRejected":
      return "Remote rejected changes";
    case "Unknown":
      return "Sync failed";
    default:
      return "Sync failed";
  }
}
