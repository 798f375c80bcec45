import { createStore } from 'zustand/vanilla';
import { detectLinearRegion } from '@/modules/linear_region/detectLinearRegion';
import { applyTrim, referenceChannel } from '@/modules/trimming/applyTrim';
import { integrateFull, integrateRatio } from '@/modules/integration/integrate';
import {
  resolveIntegrationOptions,
  resolveTrimOptions,
  type IntegrationOptions,
  type TrimOptions,
} from '@/utils/options';
import type {
  Experiment,
  FullIntegrationResult,
  IntegrationWindows,
  RatioIntegrationResult,
  TrimRegion,
  TrimmedExperiment,
} from '@/types';

export interface ExperimentEntry {
  experiment: Experiment;
  trimRegion: TrimRegion;
  trimmed: TrimmedExperiment;
  trimSource: 'auto' | 'manual';
}

export interface ExperimentState {
  experiments: Record<string, ExperimentEntry>; // name -> entry, insertion order kept
  trimOptions: Required<TrimOptions>;
  integrationOptions: Required<IntegrationOptions>;
  fullIntegration: FullIntegrationResult | null;
  ratioIntegration: RatioIntegrationResult | null;
  warnings: string[];

  addExperiment: (experiment: Experiment, warnings?: string[]) => ExperimentEntry;
  removeExperiment: (name: string) => void;
  clearAll: () => void;

  setTrimOptions: (options: TrimOptions) => void;
  setIntegrationOptions: (options: IntegrationOptions) => void;
  autoTrim: (name?: string) => void;
  setTrimRegion: (name: string, startTime: number, endTime: number) => TrimmedExperiment;

  integrateFull: (names?: string[]) => FullIntegrationResult;
  integrateRatio: (windows: IntegrationWindows, names?: string[]) => RatioIntegrationResult;

  clearWarnings: () => void;
}

function autoEntry(
  experiment: Experiment,
  options: Required<TrimOptions>,
  warnings: string[],
): ExperimentEntry {
  const reference = referenceChannel(experiment.channels, experiment.temperatureChannel);
  const region = reference ? detectLinearRegion(reference.time, reference.value, options) : null;
  if (!region) {
    warnings.push(`${experiment.name}: no linear region with slope ${options.targetSlope} ± ${options.tolerance} found.`);
  }
  return { experiment, trimRegion: region, trimmed: applyTrim(experiment, region), trimSource: 'auto' };
}

function report(tag: string, messages: string[]): void {
  messages.forEach((message) => console.warn(`[${tag}] ${message}`));
}

function pick(
  experiments: Record<string, ExperimentEntry>,
  names: string[] | undefined,
): TrimmedExperiment[] {
  const selected = names ?? Object.keys(experiments);
  return selected.map((name) => {
    const entry = experiments[name];
    if (!entry) throw new Error(`Unknown experiment "${name}"`);
    return entry.trimmed;
  });
}

/**
 * Session store for parsed experiments, their trim regions and the latest
 * integration results. Each action computes the new entries first and commits
 * them in a single `set`, so a throwing action leaves the previous state as it was.
 */
export const createExperimentStore = (
  initial: { trimOptions?: TrimOptions; integrationOptions?: IntegrationOptions } = {},
) =>
  createStore<ExperimentState>()((set, get) => ({
    experiments: {},
    trimOptions: resolveTrimOptions(initial.trimOptions),
    integrationOptions: resolveIntegrationOptions(initial.integrationOptions),
    fullIntegration: null,
    ratioIntegration: null,
    warnings: [],

    addExperiment: (experiment, parseWarnings = []) => {
      const warnings = parseWarnings.map((w) => `${experiment.name}: ${w}`);
      const entry = autoEntry(experiment, get().trimOptions, warnings);
      report('EXPERIMENT IMPORT', warnings);
      set((state) => ({
        experiments: { ...state.experiments, [experiment.name]: entry },
        warnings: [...state.warnings, ...warnings],
      }));
      return entry;
    },

    removeExperiment: (name) =>
      set((state) => {
        const { [name]: _deleted, ...rest } = state.experiments;
        return { experiments: rest, fullIntegration: null, ratioIntegration: null };
      }),

    clearAll: () =>
      set({
        experiments: {},
        fullIntegration: null,
        ratioIntegration: null,
        warnings: [],
      }),

    setTrimOptions: (options) => {
      const trimOptions = resolveTrimOptions({ ...get().trimOptions, ...options });
      const warnings: string[] = [];
      const experiments = Object.fromEntries(
        Object.entries(get().experiments).map(([name, entry]) => [
          name,
          autoEntry(entry.experiment, trimOptions, warnings),
        ]),
      );
      report('AUTO TRIM', warnings);
      set((state) => ({ trimOptions, experiments, warnings: [...state.warnings, ...warnings] }));
    },

    setIntegrationOptions: (options) => {
      const integrationOptions = resolveIntegrationOptions({ ...get().integrationOptions, ...options });
      set({ integrationOptions });
    },

    autoTrim: (name) => {
      const { experiments, trimOptions } = get();
      const names = name === undefined ? Object.keys(experiments) : [name];
      const warnings: string[] = [];
      const updated: Record<string, ExperimentEntry> = {};
      for (const n of names) {
        const entry = experiments[n];
        if (!entry) throw new Error(`Unknown experiment "${n}"`);
        updated[n] = autoEntry(entry.experiment, trimOptions, warnings);
      }
      report('AUTO TRIM', warnings);
      set((state) => ({
        experiments: { ...state.experiments, ...updated },
        warnings: [...state.warnings, ...warnings],
      }));
    },

    setTrimRegion: (name, startTime, endTime) => {
      const entry = get().experiments[name];
      if (!entry) throw new Error(`Unknown experiment "${name}"`);
      const region = { startTime, endTime };
      const trimmed = applyTrim(entry.experiment, region);
      const updated: ExperimentEntry = { experiment: entry.experiment, trimRegion: region, trimmed, trimSource: 'manual' };
      set((state) => ({ experiments: { ...state.experiments, [name]: updated } }));
      return trimmed;
    },

    integrateFull: (names) => {
      const { experiments, integrationOptions } = get();
      const result = integrateFull(pick(experiments, names), integrationOptions);
      report('INTEGRATION', result.warnings);
      set((state) => ({ fullIntegration: result, warnings: [...state.warnings, ...result.warnings] }));
      return result;
    },

    integrateRatio: (windows, names) => {
      const { experiments, integrationOptions } = get();
      const result = integrateRatio(pick(experiments, names), windows, integrationOptions);
      report('RATIO INTEGRATION', result.warnings);
      set((state) => ({ ratioIntegration: result, warnings: [...state.warnings, ...result.warnings] }));
      return result;
    },

    clearWarnings: () => set({ warnings: [] }),
  }));

export type ExperimentStore = ReturnType<typeof createExperimentStore>;
