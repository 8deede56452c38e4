// src/store/usePreview.ts
import { createStore } from "zustand/vanilla";
import { DEFAULT_PARAMS } from "../config/defaults";
import { InvalidParameterError } from "../engine/errors";
import { generateUnknown } from "../engine/generate";
import type { TopologyParamsInput } from "../engine/params";
import type { GenerationResult, TopologyKind } from "../engine/types";

/** A typed request, as callers build them */
export type GenerationRequest = {
  [K in TopologyKind]: { kind: K; params: TopologyParamsInput<K> }
}[TopologyKind];

/** A request as held by the store; patched params are re-validated on every run */
export type ActiveRequest = { kind: TopologyKind; params: unknown };

type PreviewState = {
  request?: ActiveRequest;
  result?: GenerationResult;
  /** Validation failure of the latest request; the previous result stays in place */
  error?: InvalidParameterError;

  load: (request: GenerationRequest) => void;
  loadDefaults: (kind: TopologyKind) => void;
  /** Shallow-merges into the current params and regenerates */
  update: (patch: Record<string, unknown>) => void;

  // History of requests for undo/redo
  history: ActiveRequest[];
  future: ActiveRequest[];
  undo: () => void;
  redo: () => void;
};

type Outcome = Pick<PreviewState, "result" | "error">;

function run(request: ActiveRequest, previous?: GenerationResult): Outcome {
  try {
    return { result: generateUnknown(request.kind, request.params), error: undefined };
  } catch (err) {
    if (err instanceof InvalidParameterError) return { result: previous, error: err };
    throw err;
  }
}

const isRecord = (v: unknown): v is Record<string, unknown> =>
  typeof v === "object" && v !== null && !Array.isArray(v);

/** Headless store for live re-generation; a viewer subscribes to `result`. */
export const createPreviewStore = () => createStore<PreviewState>((set, get) => {
  const commit = (request: ActiveRequest) => set(state => ({
    ...run(request, state.result),
    request,
    history: state.request ? [...state.history, state.request] : state.history,
    future: []
  }));

  return {
    request: undefined,
    result: undefined,
    error: undefined,
    history: [],
    future: [],

    load: (request) => commit(request),

    loadDefaults: (kind) => commit({ kind, params: DEFAULT_PARAMS[kind] }),

    update: (patch) => {
      const current = get().request;
      if (!current) return;
      const params = isRecord(current.params) ? current.params : {};
      commit({ kind: current.kind, params: { ...params, ...patch } });
    },

    undo: () => set(state => {
      if (!state.request || state.history.length === 0) return state;
      const prev = state.history[state.history.length - 1];
      return { ...run(prev, state.result), request: prev, history: state.history.slice(0, -1), future: [state.request, ...state.future] };
    }),

    redo: () => set(state => {
      if (!state.request || state.future.length === 0) return state;
      const next = state.future[0];
      return { ...run(next, state.result), request: next, history: [...state.history, state.request], future: state.future.slice(1) };
    })
  };
});

export type PreviewStore = ReturnType<typeof createPreviewStore>;
