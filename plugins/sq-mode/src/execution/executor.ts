// Subprocess boundary — every invocation of the external tool passes through here.
// Output is stdout and stderr interleaved in arrival order; the exit code is
// reported but never turned into an error. Only a failure to start the
// process is an error.
import execa from 'execa';
import { SqModeError, SqModeErrorCode } from '../shared/errors.js';

export interface ExecResult {
  /** stdout and stderr merged, final newline kept. */
  readonly output: string;
  readonly exitCode: number;
}

export interface Executor {
  run(program: string, args: readonly string[], input: string): Promise<ExecResult>;
}

// Errors raised by child_process may come from another realm (Jest runs
// tests in a vm context), so they are narrowed by shape, not by instanceof.
function spawnFailure(program: string, cause: unknown): SqModeError {
  const fields = typeof cause === 'object' && cause !== null ? cause : undefined;
  const code = fields && 'code' in fields && fields.code !== undefined ? String(fields.code) : undefined;
  const message = fields && 'message' in fields && typeof fields.message === 'string' ? fields.message : String(cause);
  return new SqModeError(SqModeErrorCode.SPAWN_FAILED, `Could not start ${program}: ${code ?? 'spawn failed'}`, {
    program,
    code,
    cause: message,
  });
}

function isSpawnError(value: object): boolean {
  return 'syscall' in value && typeof value.syscall === 'string' && value.syscall.startsWith('spawn');
}

/** Runs the program on this machine, located through PATH. */
export class LocalExecutor implements Executor {
  async run(program: string, args: readonly string[], input: string): Promise<ExecResult> {
    let result: execa.ExecaReturnValue;
    try {
      result = await execa(program, [...args], {
        input,
        all: true,
        reject: false,
        stripFinalNewline: false,
      });
    } catch (err) {
      throw spawnFailure(program, err);
    }

    // With reject: false a spawn error (ENOENT, EACCES) resolves instead of
    // rejecting. A stdin write error (EPIPE) also carries a syscall but the
    // process did run, so its output is kept.
    if (isSpawnError(result)) {
      throw spawnFailure(program, result);
    }

    // A tool that exits before reading all of its stdin leaves the write with
    // EPIPE; execa then resolves without an exit code.
    return {
      output: result.all ?? `${result.stdout}${result.stderr}`,
      exitCode: result.exitCode ?? (result.signal !== undefined ? 128 : 0),
    };
  }
}
