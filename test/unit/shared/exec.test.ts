import { run, runOrThrow } from '../../../src/shared/exec.js';
import { HTSErrorCode } from '../../../src/shared/errors.js';

describe('run', () => {
  it('captures output and the exit code without throwing', async () => {
    const result = await run(process.execPath, ['-e', "process.stdout.write('partial'); process.stderr.write('oops'); process.exit(3)"]);
    expect(result).toEqual({ stdout: 'partial', stderr: 'oops', exitCode: 3, signal: undefined });
  });

  it('throws LAUNCH_FAILED when the command cannot be spawned', async () => {
    await expect(run('hts-no-such-build-tool', ['clean'])).rejects.toMatchObject({ code: HTSErrorCode.LAUNCH_FAILED });
  });
});

describe('runOrThrow', () => {
  it('returns the result of a successful command', async () => {
    const result = await runOrThrow(process.execPath, ['-e', "console.log('ok')"]);
    expect(result.stdout).toBe('ok');
    expect(result.exitCode).toBe(0);
  });

  it('throws COMMAND_FAILED with the captured output on a non-zero exit', async () => {
    await expect(runOrThrow(process.execPath, ['-e', "console.error('no rule'); process.exit(2)"]))
      .rejects.toMatchObject({
        code: HTSErrorCode.COMMAND_FAILED,
        context: { stdout: '', stderr: 'no rule' },
      });
  });
});
