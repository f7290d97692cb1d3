import { execFile } from 'node:child_process';
import type { PowerAction } from '../types/completion';

/** A program and its arguments. */
export interface PowerCommand {
    file: string;
    args: string[];
}

/**
 * Gets the command that suspends or shuts down the host.
 *
 * @param platform Value of `process.platform`.
 */
export function getPowerCommand(action: PowerAction, platform: NodeJS.Platform = process.platform): PowerCommand {
    if (platform === 'win32') {
        return action === 'suspend'
            ? { file: 'rundll32.exe', args: ['powrprof.dll,SetSuspendState', '0,1,0'] }
            : { file: 'shutdown', args: ['/s', '/t', '1'] };
    }
    if (platform === 'darwin') {
        return action === 'suspend'
            ? { file: 'pmset', args: ['sleepnow'] }
            : { file: 'shutdown', args: ['-h', 'now'] };
    }
    return action === 'suspend'
        ? { file: 'systemctl', args: ['suspend'] }
        : { file: 'shutdown', args: ['now'] };
}

/**
 * Suspends or shuts down the host.
 *
 * @throws {Error} If the command cannot be run or exits with an error.
 */
export function runPowerAction(action: PowerAction, platform: NodeJS.Platform = process.platform): Promise<void> {
    const { file, args } = getPowerCommand(action, platform);
    console.log(`[Power] Running ${file} ${args.join(' ')}`);

    return new Promise<void>((resolve, reject) => {
        execFile(file, args, (error) => {
            if (error) {
                console.error(`[Power] ${action} failed:`, error);
                reject(error);
                return;
            }
            resolve();
        });
    });
}
