import { createStore } from 'zustand/vanilla';
import type { AppConfig } from '../types/config';
import type { JobParameters } from '../types/job';

export const DEFAULT_CONFIG: AppConfig = {
    transcriberCommand: '',
    optimizerCommand: '',
    generatorCommand: '',
    targetLanguage: 'en',
    needOptimize: true,
    needTranslate: false,
    needSplit: true,
    batchSize: 10,
    threadNum: 4,
    customPrompt: '',
    llmModel: 'gpt-4o-mini',
    maxWordCountCjk: 18,
    maxWordCountEnglish: 12,
    subtitleLayout: 'original-above',
    assStyle: '',
    completionPolicy: { type: 'none' },
    countdownSeconds: 60,
};

/** State interface for the config store. */
export interface ConfigState {
    /** Application configuration. */
    config: AppConfig;

    /**
     * Updates the application configuration.
     * @param config - Partial configuration updates.
     */
    setConfig: (config: Partial<AppConfig>) => void;

    /** Restores the defaults. */
    resetConfig: () => void;
}

/**
 * Creates a configuration store.
 *
 * @param initial Overrides applied on top of DEFAULT_CONFIG.
 */
export function createConfigStore(initial: Partial<AppConfig> = {}) {
    return createStore<ConfigState>((set) => ({
        config: { ...DEFAULT_CONFIG, ...initial },

        setConfig: (config) => {
            set((state) => ({
                config: { ...state.config, ...config },
            }));
        },

        resetConfig: () => set({ config: DEFAULT_CONFIG }),
    }));
}

/** Store instance returned by createConfigStore. */
export type ConfigStore = ReturnType<typeof createConfigStore>;

/**
 * Snapshots the worker parameters of a new job from the configuration.
 */
export function toJobParameters(config: AppConfig): JobParameters {
    return {
        targetLanguage: config.targetLanguage,
        needOptimize: config.needOptimize,
        needTranslate: config.needTranslate,
        needSplit: config.needSplit,
        batchSize: config.batchSize,
        threadNum: config.threadNum,
        customPrompt: config.customPrompt,
        llmModel: config.llmModel,
        maxWordCountCjk: config.maxWordCountCjk,
        maxWordCountEnglish: config.maxWordCountEnglish,
        subtitleLayout: config.subtitleLayout,
    };
}
