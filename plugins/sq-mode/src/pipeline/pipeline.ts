// Invocation pipeline: input → external tool → shared output buffer → display.
// Invocations run strictly one at a time; a call made while another is in
// flight waits for it. The exit status is logged and otherwise ignored.
import type { EditorHost } from '../types/host.js';
import type { ArgumentList, InputSource, InvocationResult } from '../types/invocation.js';
import type { Executor } from '../execution/executor.js';
import { resolveInput } from './input.js';
import { chooseDisplay, trimOutput } from './display.js';
import { logger } from '../logger.js';

export interface PipelineOptions {
  /** Executable name, resolved through PATH. */
  program: string;
  /** Name of the shared output buffer. */
  outputBuffer: string;
}

export class InvocationPipeline {
  private tail: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly host: EditorHost,
    private readonly executor: Executor,
    private readonly options: PipelineOptions,
  ) {}

  invoke(args: ArgumentList, input: InputSource): Promise<InvocationResult> {
    const run = this.tail.then(() => this.execute(args, input));
    // The queue only orders calls; each caller sees its own rejection through `run`.
    this.tail = run.then(() => undefined, () => undefined);
    return run;
  }

  private async execute(args: ArgumentList, source: InputSource): Promise<InvocationResult> {
    // Read the input before touching the buffer: the document may be the buffer itself.
    const input = resolveInput(this.host, source);

    const buffer = this.host.scratchBuffer(this.options.outputBuffer);
    buffer.setText('');
    buffer.markUnmodified();

    logger.debug({ program: this.options.program, args, source: source.kind, inputLength: input.length },
      'Invoking external tool');
    const { output: raw, exitCode } = await this.executor.run(this.options.program, args, input);

    const output = trimOutput(raw);
    buffer.setText(output);
    buffer.markUnmodified();
    logger.debug({ args, exitCode, outputLength: output.length }, 'External tool finished');

    const display = chooseDisplay(output, this.host.statusLineWidth());
    if (display === 'message') {
      this.host.showMessage(output);
    } else {
      this.host.showBuffer(buffer);
    }
    return { output, display };
  }
}
