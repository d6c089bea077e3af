import { DEFAULT_KEY_PREFIX, KeybindingManager } from '../../../src/keys/manager.js';
import { CommandRegistry } from '../../../src/commands/registry.js';
import { InvocationPipeline } from '../../../src/pipeline/pipeline.js';
import { HeadlessHost } from '../../../src/host/headless.js';
import { SqModeError } from '../../../src/shared/errors.js';
import { fixedOutput } from '../../helpers/fake-executor.js';

function setup() {
  const host = new HeadlessHost(80);
  const executor = fixedOutput('Public-Key Packet\n  Version: 4\n');
  const pipeline = new InvocationPipeline(host, executor, { program: 'sq', outputBuffer: '*sq output*' });
  const manager = new KeybindingManager(host, pipeline, new CommandRegistry());
  return { host, executor, manager };
}

describe('KeybindingManager', () => {
  it('binds nothing until register is called', () => {
    const { host, manager } = setup();
    expect(host.boundKeys()).toEqual([]);
    expect(manager.bindings()).toEqual([]);
  });

  it('binds the five commands under the default two-key prefix', () => {
    const { host, manager } = setup();
    const bindings = manager.register();

    expect(DEFAULT_KEY_PREFIX).toBe('C-c s');
    expect(bindings).toEqual([
      { keys: 'C-c s d', command: 'packet-dump' },
      { keys: 'C-c s h', command: 'packet-dump-hex' },
      { keys: 'C-c s m', command: 'packet-dump-mpis' },
      { keys: 'C-c s i', command: 'inspect' },
      { keys: 'C-c s c', command: 'command' },
    ]);
    expect(host.boundKeys()).toEqual(['C-c s d', 'C-c s h', 'C-c s m', 'C-c s i', 'C-c s c']);
  });

  it('replaces earlier bindings when registered again with another prefix', () => {
    const { host, manager } = setup();
    manager.register();
    manager.register('C-c C-p');
    expect(host.boundKeys()).toEqual(['C-c C-p d', 'C-c C-p h', 'C-c C-p m', 'C-c C-p i', 'C-c C-p c']);
  });

  it('keeps the current bindings when the new prefix is invalid', () => {
    const { host, manager } = setup();
    manager.register();
    expect(() => manager.register('C-')).toThrow(SqModeError);
    expect(host.boundKeys()).toHaveLength(5);
    expect(manager.bindings()[0]).toEqual({ keys: 'C-c s d', command: 'packet-dump' });
  });

  it('runs the bound command when its keys are pressed', async () => {
    const { host, executor, manager } = setup();
    manager.register();
    const outcome = await host.session({ text: 'key material' }, () => host.pressKeys('C-c s h'));

    expect(executor.runs).toEqual([{ program: 'sq', args: ['packet', 'dump', '--hex'], input: 'key material' }]);
    expect(outcome.presentation).toEqual({
      kind: 'buffer',
      buffer: '*sq output*',
      text: 'Public-Key Packet\n  Version: 4',
    });
  });
});
