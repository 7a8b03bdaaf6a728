/**
 * Zustand store for strategy parameters and the computed projection.
 * Every parameter change recomputes the whole projection; there is no incremental update.
 */

import { createStore } from "zustand/vanilla";
import {
  StrategyParametersSchema,
  type StrategyParameters,
  type StrategyParametersInput,
} from "@/lib/types/zod";
import {
  runProjection,
  type ProjectionResult,
  type RoundingMode,
} from "@/lib/model/engine";
import {
  validateParameters,
  parseStrategyParameters,
  type ValidationError,
  type ValidationWarning,
} from "@/lib/model/validation";
import { ConfigurationError } from "@/lib/model/errors";

// --- Defaults ---

function createDefaultParameters(): StrategyParameters {
  return StrategyParametersSchema.parse({});
}

// --- Store state ---

export interface ProjectorState {
  parameters: StrategyParameters;
  rounding: RoundingMode;
  /** Null while parameters have hard errors. */
  projection: ProjectionResult | null;
  errors: ValidationError[];
  warnings: ValidationWarning[];
  /** Parameters/projection before the last change; used for the What Changed panel. */
  previousParameters: StrategyParameters | null;
  previousProjection: ProjectionResult | null;
}

export interface ProjectorActions {
  setParameters: (patch: Partial<StrategyParameters>) => void;
  /** Replace all parameters from untrusted input (imported JSON, query string). Returns false when rejected. */
  loadParameters: (input: unknown) => boolean;
  resetParameters: () => void;
  setRounding: (rounding: RoundingMode) => void;
  clearComparison: () => void;
  recomputeProjection: () => void;
}

export type ProjectorStore = ProjectorState & ProjectorActions;

export function createProjectorStore(initial?: StrategyParametersInput) {
  const store = createStore<ProjectorStore>()((set, get) => ({
    parameters: StrategyParametersSchema.parse(initial ?? {}),
    rounding: "PER_STEP",
    projection: null,
    errors: [],
    warnings: [],
    previousParameters: null,
    previousProjection: null,

    setParameters: (patch) => {
      const { parameters, projection } = get();
      if (projection) {
        set({
          previousParameters: parameters,
          previousProjection: projection,
        });
      }
      set({ parameters: { ...parameters, ...patch }, projection: null });
      get().recomputeProjection();
    },

    loadParameters: (input) => {
      let next: StrategyParameters;
      try {
        next = parseStrategyParameters(input);
      } catch (err) {
        if (err instanceof ConfigurationError) {
          console.error("[Projector] Invalid parameters:", err.errors);
          return false;
        }
        throw err;
      }
      get().setParameters(next);
      return true;
    },

    resetParameters: () => {
      get().setParameters(createDefaultParameters());
    },

    setRounding: (rounding) => {
      set({ rounding, projection: null });
      get().recomputeProjection();
    },

    clearComparison: () => {
      set({ previousParameters: null, previousProjection: null });
    },

    recomputeProjection: () => {
      const { parameters, rounding } = get();
      const { errors, warnings } = validateParameters(parameters);
      if (errors.length > 0) {
        set({ projection: null, errors, warnings });
        return;
      }
      const projection = runProjection(parameters, { rounding });
      set({ projection, errors: [], warnings });
    },
  }));

  store.getState().recomputeProjection();
  return store;
}
