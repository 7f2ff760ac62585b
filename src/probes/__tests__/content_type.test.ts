import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('execa', () => ({ execa: vi.fn() }));

import { execa } from 'execa';
import {
  FileCommandProbe,
  classifyDescription,
  isFalsePositivePath,
  isProbeCandidate,
  looksLikeBinaryPath,
  looksLikeSoname,
} from '../content_type.js';
import { ProbeError } from '../../core/errors.js';
import { ELF_EXECUTABLE, ELF_SHARED_OBJECT, ELF_STATIC_EXECUTABLE, TEXT_FILE } from '../../test/vdb_fixture.js';

const execaMock = vi.mocked(execa);

function buildExecaResult(overrides: {
  failed: boolean;
  exitCode: number | undefined;
  stdout?: string;
  stderr?: string;
}): Awaited<ReturnType<typeof execa>> {
  return { stdout: '', stderr: '', ...overrides } as unknown as Awaited<ReturnType<typeof execa>>;
}

describe('FileCommandProbe', () => {
  beforeEach(() => {
    execaMock.mockReset();
  });

  it('runs file -b and trims its output', async () => {
    execaMock.mockResolvedValueOnce(buildExecaResult({ failed: false, exitCode: 0, stdout: `${ELF_SHARED_OBJECT}\n`, stderr: '' }));

    const description = await new FileCommandProbe().describe('/usr/lib64/libbar.so.1');

    expect(description).toBe(ELF_SHARED_OBJECT);
    expect(execaMock).toHaveBeenCalledWith('file', ['-b', '/usr/lib64/libbar.so.1'], { reject: false });
  });

  it('raises ProbeError carrying stderr on a non-zero exit', async () => {
    execaMock.mockResolvedValueOnce(buildExecaResult({ failed: true, exitCode: 1, stdout: '', stderr: 'cannot open' }));

    const error = await new FileCommandProbe('file').describe('/usr/bin/gone').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ProbeError);
    expect(error).toMatchObject({
      code: 'PROBE_FAILED',
      command: 'file',
      path: '/usr/bin/gone',
      message: 'file failed for /usr/bin/gone: cannot open',
    });
  });

  it('reports the exit code when the command printed nothing', async () => {
    execaMock.mockResolvedValueOnce(buildExecaResult({ failed: true, exitCode: undefined, stdout: '', stderr: '' }));

    await expect(new FileCommandProbe('/opt/bin/file').describe('/usr/bin/foo')).rejects.toThrow(
      'exit code undefined',
    );
  });
});

describe('classifyDescription', () => {
  it('recognises dynamically linked shared objects and executables', () => {
    expect(classifyDescription(ELF_SHARED_OBJECT)).toBe('shared-object');
    expect(classifyDescription(ELF_EXECUTABLE)).toBe('executable');
  });

  it('ignores static binaries and non-ELF files', () => {
    expect(classifyDescription(ELF_STATIC_EXECUTABLE)).toBeNull();
    expect(classifyDescription(TEXT_FILE)).toBeNull();
    expect(classifyDescription('ELF 64-bit LSB relocatable, x86-64, dynamically linked')).toBeNull();
  });
});

describe('path heuristics', () => {
  it('matches soname-like paths', () => {
    expect(looksLikeSoname('/usr/lib64/libbar.so')).toBe(true);
    expect(looksLikeSoname('/usr/lib64/libbar.so.1.2.3')).toBe(true);
    expect(looksLikeSoname('/usr/lib64/libbar.sox')).toBe(false);
    expect(looksLikeSoname('/usr/lib64/libbar.a')).toBe(false);
  });

  it('matches bin-like paths', () => {
    expect(looksLikeBinaryPath('/usr/bin/foo')).toBe(true);
    expect(looksLikeBinaryPath('/usr/libexec/foo/helper')).toBe(true);
    expect(looksLikeBinaryPath('/etc/foo.conf')).toBe(false);
  });

  it('flags documentation and header trees', () => {
    expect(isFalsePositivePath('/usr/share/man/man1/binutils.1.bz2')).toBe(true);
    expect(isFalsePositivePath('/usr/include/bits/foo.h')).toBe(true);
    expect(isFalsePositivePath('/usr/bin/foo')).toBe(false);
  });

  it('selects candidates by name unless deep', () => {
    expect(isProbeCandidate('/usr/bin/foo', false)).toBe(true);
    expect(isProbeCandidate('/opt/tool/run', false)).toBe(false);
    expect(isProbeCandidate('/opt/tool/run', true)).toBe(true);
    expect(isProbeCandidate('/usr/share/doc/bin-notes.txt', true)).toBe(false);
  });
});
