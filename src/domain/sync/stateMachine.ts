import { assign, setup } from "xstate";
import { SyncStatus } from "../../types";

export type SyncPhase =
  | "disabled"
  | "unavailable"
  | "ready"
  | "syncing"
  | "error";

export interface SyncMachineState {
  phase: SyncPhase;
  // Set when the machine becomes ready; cleared once the sync is dispatched.
  syncPending: boolean;
}

export interface SyncMachineInputs {
  enabled: boolean;
  signedIn: boolean;
}

export type SyncMachineEvent =
  | { type: "INPUTS_CHANGED"; inputs: SyncMachineInputs }
  | { type: "SYNC_DISPATCHED" }
  | { type: "SYNC_STARTED" }
  | { type: "SYNC_FINISHED"; status: SyncStatus };

export const initialSyncMachineState: SyncMachineState = {
  phase: "disabled",
  syncPending: false,
};

export const syncStateMachine = setup({
  types: {
    context: {} as SyncMachineState,
    events: {} as SyncMachineEvent,
  },
}).createMachine({
  id: "syncState",
  initial: "disabled",
  context: initialSyncMachineState,
  states: {
    disabled: {
      id: "disabled",
      entry: assign({ phase: "disabled", syncPending: false }),
      on: {
        INPUTS_CHANGED: [
          {
            guard: ({ event }) => event.inputs.enabled && event.inputs.signedIn,
            target: "#ready",
            actions: assign({ syncPending: true }),
          },
          {
            guard: ({ event }) =>
              event.inputs.enabled && !event.inputs.signedIn,
            target: "#unavailable",
          },
        ],
      },
    },
    unavailable: {
      id: "unavailable",
      entry: assign({ phase: "unavailable", syncPending: false }),
      on: {
        INPUTS_CHANGED: [
          {
            guard: ({ event }) => !event.inputs.enabled,
            target: "#disabled",
          },
          {
            guard: ({ event }) => event.inputs.signedIn,
            target: "#ready",
            actions: assign({ syncPending: true }),
          },
        ],
      },
    },
    ready: {
      id: "ready",
      entry: assign({ phase: "ready" }),
      on: {
        INPUTS_CHANGED: [
          {
            guard: ({ event }) => !event.inputs.enabled,
            target: "#disabled",
          },
          {
            guard: ({ event }) => !event.inputs.signedIn,
            target: "#unavailable",
          },
        ],
        SYNC_DISPATCHED: {
          actions: assign({ syncPending: false }),
        },
        SYNC_STARTED: {
          target: "#syncing",
        },
      },
    },
    syncing: {
      id: "syncing",
      entry: assign({ phase: "syncing", syncPending: false }),
      on: {
        INPUTS_CHANGED: {
          guard: ({ event }) => !event.inputs.enabled,
          target: "#disabled",
        },
        SYNC_FINISHED: [
          {
            guard: ({ event }) => event.status === SyncStatus.Unavailable,
            target: "#unavailable",
          },
          {
            guard: ({ event }) => event.status === SyncStatus.Error,
            target: "#error",
          },
          {
            target: "#ready",
          },
        ],
      },
    },
    error: {
      id: "error",
      entry: assign({ phase: "error", syncPending: false }),
      on: {
        INPUTS_CHANGED: [
          {
            guard: ({ event }) => !event.inputs.enabled,
            target: "#disabled",
          },
          {
            guard: ({ event }) => !event.inputs.signedIn,
            target: "#unavailable",
          },
        ],
        SYNC_STARTED: {
          target: "#syncing",
        },
      },
    },
  },
});
