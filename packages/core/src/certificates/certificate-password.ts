import { spawn } from 'node:child_process';
import type { Tracer } from '../types/tracer.js';

export type PasswordLookupResult =
  | { success: true; password: string }
  | { success: false; error: string };

/** Looks up the password protecting a client certificate's private key. */
export type CertificatePasswordProvider = (
  certificateId: string,
) => Promise<PasswordLookupResult>;

export interface GitCommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export type GitCommandRunner = (
  args: Array<string>,
  stdin: string,
) => Promise<GitCommandResult>;

export interface GitCommandRunnerOptions {
  /** Default: `'git'`, resolved through PATH */
  gitBinPath?: string;
  workingDirectory?: string;
}

/**
 * Run git with `stdin` piped in. Prompts are disabled so a missing
 * credential fails instead of blocking on a terminal.
 */
export function createGitCommandRunner(
  options: GitCommandRunnerOptions = {},
): GitCommandRunner {
  const gitBinPath = options.gitBinPath ?? 'git';

  return (args, stdin) =>
    new Promise<GitCommandResult>((resolve, reject) => {
      const child = spawn(gitBinPath, args, {
        cwd: options.workingDirectory,
        env: { ...process.env, GIT_TERMINAL_PROMPT: '0' },
        stdio: ['pipe', 'pipe', 'pipe'],
      });

      let stdout = '';
      let stderr = '';
      child.stdout.setEncoding('utf8');
      child.stderr.setEncoding('utf8');
      child.stdout.on('data', (chunk: string) => {
        stdout += chunk;
      });
      child.stderr.on('data', (chunk: string) => {
        stderr += chunk;
      });

      // git may exit before reading its input; the exit status decides.
      child.stdin.on('error', (error) => {
        stderr += error.message;
      });
      child.once('error', reject);
      child.once('close', (code) => {
        resolve({ exitCode: code ?? -1, stdout, stderr });
      });

      child.stdin.end(stdin);
    });
}

/**
 * Parse `key=value` lines as printed by `git credential fill`.
 */
export function parseCredentialOutput(output: string): Map<string, string> {
  const values = new Map<string, string>();
  for (const line of output.split(/\r?\n/)) {
    const eqIdx = line.indexOf('=');
    if (eqIdx <= 0) continue;
    values.set(line.slice(0, eqIdx), line.slice(eqIdx + 1));
  }
  return values;
}

export interface GitCertificatePasswordProviderOptions {
  tracer: Tracer;
  runGit?: GitCommandRunner;
}

/**
 * Asks git's credential helpers for a certificate password, the same way git
 * itself does for `http.sslCertPasswordProtected`: a credential with
 * `protocol=cert` and the certificate path.
 */
export function createGitCertificatePasswordProvider(
  options: GitCertificatePasswordProviderOptions,
): CertificatePasswordProvider {
  const runGit = options.runGit ?? createGitCommandRunner();

  return async (certificateId) => {
    let result: GitCommandResult;
    try {
      result = await runGit(
        ['credential', 'fill'],
        `protocol=cert\npath=${certificateId}\nusername=\n\n`,
      );
    } catch (error) {
      options.tracer.relatedError('Failed to run git credential fill', {
        Exception: error,
        CertificateId: certificateId,
      });
      return {
        success: false,
        error: error instanceof Error ? error.message : String(error),
      };
    }

    if (result.exitCode !== 0) {
      return {
        success: false,
        error: `git credential fill exited with code ${result.exitCode}: ${result.stderr.trim()}`,
      };
    }

    const password = parseCredentialOutput(result.stdout).get('password');
    if (password === undefined) {
      return {
        success: false,
        error: 'git credential fill returned no password',
      };
    }

    return { success: true, password };
  };
}
