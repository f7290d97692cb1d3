import { describe, it, expect, beforeEach, vi } from 'vitest';
import { execFile } from 'node:child_process';
import { getPowerCommand, runPowerAction } from '../powerService';

const execResult = vi.hoisted(() => {
    const state: { error: Error | null } = { error: null };
    return state;
});

vi.mock('node:child_process', () => ({
    execFile: vi.fn((_file: string, _args: string[], callback: (error: Error | null) => void) => {
        callback(execResult.error);
    }),
}));

describe('powerService', () => {
    beforeEach(() => {
        vi.mocked(execFile).mockClear();
        execResult.error = null;
    });

    it('should pick the command for each platform', () => {
        expect(getPowerCommand('suspend', 'win32')).toEqual({ file: 'rundll32.exe', args: ['powrprof.dll,SetSuspendState', '0,1,0'] });
        expect(getPowerCommand('shutdown', 'win32')).toEqual({ file: 'shutdown', args: ['/s', '/t', '1'] });
        expect(getPowerCommand('suspend', 'darwin')).toEqual({ file: 'pmset', args: ['sleepnow'] });
        expect(getPowerCommand('shutdown', 'darwin')).toEqual({ file: 'shutdown', args: ['-h', 'now'] });
        expect(getPowerCommand('suspend', 'linux')).toEqual({ file: 'systemctl', args: ['suspend'] });
        expect(getPowerCommand('shutdown', 'linux')).toEqual({ file: 'shutdown', args: ['now'] });
    });

    it('should run the command and resolve on success', async () => {
        await expect(runPowerAction('suspend', 'linux')).resolves.toBeUndefined();
        expect(vi.mocked(execFile).mock.calls[0].slice(0, 2)).toEqual(['systemctl', ['suspend']]);
    });

    it('should reject when the command fails', async () => {
        execResult.error = new Error('Interactive authentication required');

        await expect(runPowerAction('shutdown', 'linux')).rejects.toThrow('Interactive authentication required');
    });
});
