import { chmodSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { Tracer } from '../types/tracer.js';
import {
  createGitCertificatePasswordProvider,
  createGitCommandRunner,
  parseCredentialOutput,
  type GitCommandRunner,
} from './certificate-password.js';

function createTracer() {
  return {
    relatedEvent: vi.fn<Tracer['relatedEvent']>(),
    relatedError: vi.fn<Tracer['relatedError']>(),
  };
}

describe('parseCredentialOutput', () => {
  it('splits key=value lines on the first equals sign', () => {
    const values = parseCredentialOutput(
      'protocol=cert\npath=/certs/client.pem\npassword=a=b\n\n',
    );

    expect(values.get('protocol')).toBe('cert');
    expect(values.get('path')).toBe('/certs/client.pem');
    expect(values.get('password')).toBe('a=b');
  });
});

describe('createGitCertificatePasswordProvider', () => {
  it('asks git for a cert credential and returns the password', async () => {
    const runGit = vi.fn<GitCommandRunner>().mockResolvedValue({
      exitCode: 0,
      stdout: 'protocol=cert\npath=/certs/client.pem\npassword=test-secret\n',
      stderr: '',
    });
    const provider = createGitCertificatePasswordProvider({
      tracer: createTracer(),
      runGit,
    });

    await expect(provider('/certs/client.pem')).resolves.toEqual({
      success: true,
      password: 'test-secret',
    });
    expect(runGit).toHaveBeenCalledWith(
      ['credential', 'fill'],
      'protocol=cert\npath=/certs/client.pem\nusername=\n\n',
    );
  });

  it('fails when git exits with an error', async () => {
    const provider = createGitCertificatePasswordProvider({
      tracer: createTracer(),
      runGit: async () => ({
        exitCode: 128,
        stdout: '',
        stderr: 'fatal: could not read Password\n',
      }),
    });

    await expect(provider('/certs/client.pem')).resolves.toEqual({
      success: false,
      error:
        'git credential fill exited with code 128: fatal: could not read Password',
    });
  });

  it('fails when no password line is printed', async () => {
    const provider = createGitCertificatePasswordProvider({
      tracer: createTracer(),
      runGit: async () => ({ exitCode: 0, stdout: 'protocol=cert\n', stderr: '' }),
    });

    await expect(provider('/certs/client.pem')).resolves.toEqual({
      success: false,
      error: 'git credential fill returned no password',
    });
  });

  it('logs and fails when git cannot be started', async () => {
    const tracer = createTracer();
    const provider = createGitCertificatePasswordProvider({
      tracer,
      runGit: async () => {
        throw Object.assign(new Error('spawn git ENOENT'), { code: 'ENOENT' });
      },
    });

    await expect(provider('/certs/client.pem')).resolves.toEqual({
      success: false,
      error: 'spawn git ENOENT',
    });
    expect(tracer.relatedError).toHaveBeenCalledWith(
      'Failed to run git credential fill',
      expect.objectContaining({ CertificateId: '/certs/client.pem' }),
    );
  });
});

describe('createGitCommandRunner', () => {
  let directory: string;

  function writeScript(name: string, body: string): string {
    const path = join(directory, name);
    writeFileSync(path, `#!/bin/sh\n${body}`);
    chmodSync(path, 0o755);
    return path;
  }

  beforeAll(() => {
    directory = mkdtempSync(join(tmpdir(), 'blobfetch-git-'));
  });

  afterAll(() => {
    rmSync(directory, { recursive: true, force: true });
  });

  it('pipes stdin to the helper and collects its output', async () => {
    const gitBinPath = writeScript(
      'echo-git',
      [
        'while IFS= read -r line; do',
        '  [ -z "$line" ] && break',
        '  echo "$line"',
        'done',
        'echo "args=$*"',
        'echo "prompt=$GIT_TERMINAL_PROMPT"',
        'echo "password=test-secret"',
        '',
      ].join('\n'),
    );
    const runGit = createGitCommandRunner({ gitBinPath });

    await expect(
      runGit(
        ['credential', 'fill'],
        'protocol=cert\npath=/certs/client.pem\nusername=\n\n',
      ),
    ).resolves.toEqual({
      exitCode: 0,
      stdout:
        'protocol=cert\npath=/certs/client.pem\nusername=\nargs=credential fill\nprompt=0\npassword=test-secret\n',
      stderr: '',
    });

    const provider = createGitCertificatePasswordProvider({
      tracer: createTracer(),
      runGit,
    });
    await expect(provider('/certs/client.pem')).resolves.toEqual({
      success: true,
      password: 'test-secret',
    });
  });

  it('reports the exit code and stderr of a failing helper', async () => {
    const gitBinPath = writeScript(
      'failing-git',
      'cat > /dev/null\necho "fatal: could not read Password" >&2\nexit 128\n',
    );
    const runGit = createGitCommandRunner({ gitBinPath });

    await expect(runGit(['credential', 'fill'], 'protocol=cert\n\n')).resolves.toEqual({
      exitCode: 128,
      stdout: '',
      stderr: 'fatal: could not read Password\n',
    });

    const provider = createGitCertificatePasswordProvider({
      tracer: createTracer(),
      runGit,
    });
    await expect(provider('/certs/client.pem')).resolves.toEqual({
      success: false,
      error:
        'git credential fill exited with code 128: fatal: could not read Password',
    });
  });

  it('rejects when the helper binary does not exist', async () => {
    const runGit = createGitCommandRunner({
      gitBinPath: join(directory, 'missing-git'),
    });

    await expect(
      runGit(['credential', 'fill'], 'protocol=cert\n\n'),
    ).rejects.toMatchObject({ code: 'ENOENT' });
  });
});
