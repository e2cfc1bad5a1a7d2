/**
 * Command Runner
 *
 * Runs host commands (account management, systemctl, unzip, ...) without a
 * shell. A non-zero exit is a result, not an error; spawn failures and
 * timeouts reject.
 */

import { execFile } from 'child_process';
import { promisify } from 'util';

const execFileAsync = promisify(execFile);

export const DEFAULT_COMMAND_TIMEOUT_MS = 60000;

export interface CommandResult {
	exitCode: number;
	stdout: string;
	stderr: string;
}

export interface CommandOptions {
	timeoutMs?: number;
	env?: NodeJS.ProcessEnv;
}

export interface CommandRunner {
	run(command: string, args: string[], options?: CommandOptions): Promise<CommandResult>;
}

export class ExecCommandRunner implements CommandRunner {
	public async run(command: string, args: string[], options: CommandOptions = {}): Promise<CommandResult> {
		const timeoutMs = options.timeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
		try {
			const { stdout, stderr } = await execFileAsync(command, args, {
				encoding: 'utf8',
				timeout: timeoutMs,
				maxBuffer: 10 * 1024 * 1024,
				env: options.env ?? process.env,
			});
			return { exitCode: 0, stdout, stderr };
		} catch (error) {
			if (!(error instanceof Error)) {
				throw error;
			}
			if ('killed' in error && error.killed === true) {
				throw new Error(`Command timed out after ${timeoutMs}ms: ${command} ${args.join(' ')}`);
			}
			if ('code' in error && typeof error.code === 'number') {
				return {
					exitCode: error.code,
					stdout: 'stdout' in error && typeof error.stdout === 'string' ? error.stdout : '',
					stderr: 'stderr' in error && typeof error.stderr === 'string' ? error.stderr : '',
				};
			}
			throw error;
		}
	}
}

/**
 * `cmd arg1 arg2` for log lines
 */
export function formatCommand(command: string, args: string[]): string {
	return [command, ...args].join(' ');
}
