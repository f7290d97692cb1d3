import type { CompletionOutcome, CompletionPolicy, PowerAction } from '../types/completion';
import type { Notifier } from '../stores/notificationStore';
import { toErrorMessage } from '../utils/errorUtils';
import { runPowerAction } from './powerService';

/** Grace window before a power action, in seconds. */
export const DEFAULT_COUNTDOWN_SECONDS = 60;

/** Carries out the completion policy once a batch finishes. */
export interface CompletionDispatcher {
    /**
     * Performs the action of the policy. Never rejects.
     */
    dispatch(policy: CompletionPolicy): Promise<CompletionOutcome>;
}

/** Dependencies of the completion dispatcher. */
export interface CompletionDeps {
    /**
     * Shows a cancellable countdown. Resolves to true when it runs out or is
     * confirmed, false when cancelled.
     */
    countdown: (message: string, seconds: number) => Promise<boolean>;
    /** Suspends or shuts down the host. */
    power?: (action: PowerAction) => Promise<void>;
    /** Terminates the process. */
    exit?: (code: number) => void;
    notify?: Notifier;
    /** Countdown length, or a getter read each time a batch finishes. */
    countdownSeconds?: number | (() => number);
}

const POWER_LABELS: Record<PowerAction, string> = {
    suspend: 'suspend',
    shutdown: 'shut down',
};

/**
 * Creates the dispatcher that runs after the last job of a batch.
 */
export function createCompletionDispatcher({
    countdown,
    power = runPowerAction,
    exit = (code) => process.exit(code),
    notify,
    countdownSeconds = DEFAULT_COUNTDOWN_SECONDS,
}: CompletionDeps): CompletionDispatcher {
    const runPower = async (action: PowerAction): Promise<CompletionOutcome> => {
        const label = POWER_LABELS[action];
        const seconds = typeof countdownSeconds === 'function' ? countdownSeconds() : countdownSeconds;
        const confirmed = await countdown(`All tasks are finished. The computer will ${label} in ${seconds} seconds.`, seconds);
        if (!confirmed) {
            console.log(`[Completion] ${action} cancelled by the user`);
            notify?.('info', 'Cancelled', `The computer will not ${label}`);
            return { policy: action, performed: false };
        }

        try {
            await power(action);
            return { policy: action, performed: true };
        } catch (error) {
            console.error(`[Completion] Failed to ${label}:`, error);
            notify?.('error', `Failed to ${label}`, toErrorMessage(error));
            return { policy: action, performed: false };
        }
    };

    return {
        async dispatch(policy) {
            console.log(`[Completion] Batch finished, policy: ${policy.type}`);

            switch (policy.type) {
                case 'none':
                    return { policy: 'none', performed: false };
                case 'exit':
                    exit(policy.exitCode);
                    return { policy: 'exit', performed: true };
                case 'suspend':
                case 'shutdown':
                    return runPower(policy.type);
                default: {
                    const unreachable: never = policy;
                    return unreachable;
                }
            }
        },
    };
}
