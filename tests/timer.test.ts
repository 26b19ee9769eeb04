/**
 * TimerRecorder tests: start/stop state machine, block texts, scope guard,
 * function wrapper, and misuse diagnostics.
 */
import { describe, it, expect } from 'vitest';
import { writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { TimerRecorder, currentThreadId, timed } from '../src/index';
import type { Registry } from '../src/index';
import { makeTempDir, removeDir, sequenceClock, testRegistry } from './utils';

// Wall clock ticking by 10 ns on every read; block k spans [(2k+1)·10, (2k+2)·10]
const TICKS = Array.from({ length: 100 }, (_, i) => (i + 1) * 10);

/** Four blocks per timer, with texts set from every possible place. */
function createClassBlocks(registry: Registry): [TimerRecorder, TimerRecorder] {
  const timerA = new TimerRecorder('Timer A', { registry });
  timerA.start();
  timerA.stop();
  timerA.start('Block A');
  timerA.stop();
  timerA.start();
  timerA.stop('Block B');
  timerA.start();
  timerA.stop();

  const timerB = new TimerRecorder('Timer B', { registry, text: 'Block C' });
  timerB.start();
  timerB.stop();
  timerB.start('Block D');
  timerB.stop();
  timerB.start();
  timerB.stop('Block E');
  timerB.start();
  timerB.stop();

  return [timerA, timerB];
}

describe('TimerRecorder', () => {
  it('records blocks with texts from constructor, start and stop', () => {
    const { registry } = testRegistry({ clock: sequenceClock(TICKS) });
    const [timerA, timerB] = createClassBlocks(registry);

    expect(registry.size).toBe(2);
    expect(timerA.name).toBe('Timer A');
    expect(timerB.name).toBe('Timer B');
    expect(timerA.blocks.map(b => b.text)).toEqual([null, 'Block A', 'Block B', null]);
    expect(timerB.blocks.map(b => b.text)).toEqual(['Block C', 'Block D', 'Block E', null]);

    for (const block of [...timerA.blocks, ...timerB.blocks]) {
      expect(block.stopTime).toBeGreaterThanOrEqual(block.startTime);
      expect(block.threadCpuDuration).toBeGreaterThanOrEqual(0);
    }
  });

  it('timestamps blocks in call order', () => {
    const { registry } = testRegistry({ clock: sequenceClock(TICKS) });
    const [timerA, timerB] = createClassBlocks(registry);

    expect(timerA.blocks[0]).toEqual({ startTime: 10, stopTime: 20, threadCpuDuration: 0, text: null });
    expect(timerA.blocks[3]).toEqual({ startTime: 70, stopTime: 80, threadCpuDuration: 0, text: null });
    expect(timerB.blocks[0]).toEqual({ startTime: 90, stopTime: 100, threadCpuDuration: 0, text: 'Block C' });
  });

  it('keeps the last text given among constructor, start and stop', () => {
    const { registry } = testRegistry();
    const timers = [
      new TimerRecorder('Timer A', { registry, text: 'Block A' }),
      new TimerRecorder('Timer B', { registry, text: 'Block B' }),
      new TimerRecorder('Timer C', { registry, text: 'Block C' }),
      new TimerRecorder('Timer D', { registry, text: 'Block D' }),
      new TimerRecorder('Timer E', { registry }),
    ];
    timers[0].start();
    timers[0].stop();
    timers[1].start('Block B2');
    timers[1].stop();
    timers[2].start();
    timers[2].stop('Block C3');
    timers[3].start('Block D2');
    timers[3].stop('Block D3');
    timers[4].start();
    timers[4].stop('Block E3');

    expect(registry.generateReport().map(r => r.text)).toEqual([
      'Block A', 'Block B2', 'Block C3', 'Block D3', 'Block E3',
    ]);
  });

  it('stringifies non-string texts', () => {
    const { registry } = testRegistry();
    const timer = new TimerRecorder('Timer A', { registry, text: 3 });
    timer.start();
    timer.stop();
    timer.start(7);
    timer.stop();
    timer.start();
    timer.stop(false);

    expect(timer.blocks.map(b => b.text)).toEqual(['3', '7', 'false']);
  });

  it('measures CPU time between start and stop', () => {
    const { registry } = testRegistry({ clock: sequenceClock([100, 250], [1000, 1800]) });
    const timer = new TimerRecorder('Timer A', { registry });
    timer.start();
    timer.stop();

    expect(timer.blocks).toEqual([{ startTime: 100, stopTime: 250, threadCpuDuration: 800, text: null }]);
  });

  it('never reports negative durations', () => {
    const { registry } = testRegistry({ clock: sequenceClock([300, 200], [500, 200]) });
    const timer = new TimerRecorder('Timer A', { registry });
    timer.start();
    timer.stop();

    expect(timer.blocks[0]).toEqual({ startTime: 300, stopTime: 300, threadCpuDuration: 0, text: null });
  });

  it('captures the thread id and role at construction', () => {
    const { registry } = testRegistry({ role: 'main' });
    const timer = new TimerRecorder('Timer A', { registry });

    expect(timer.threadId).toBe(currentThreadId());
    expect(timer.role).toBe('main');
  });

  it('describes itself', () => {
    const { registry } = testRegistry();
    expect(String(new TimerRecorder('Timer A', { registry, text: 'Block A' })))
      .toBe("TimerRecorder (name='Timer A', text='Block A')");
    expect(String(new TimerRecorder('Timer B', { registry })))
      .toBe("TimerRecorder (name='Timer B', text=null)");
  });

  // ── Misuse ──────────────────────────────────────────────────────────────

  describe('misuse', () => {
    it('ignores a second start with a warning and keeps working', () => {
      const { registry, diagnostics } = testRegistry();
      const timer = new TimerRecorder('Timer A', { registry });
      timer.start('first');
      timer.start('second');

      expect(diagnostics).toEqual([{
        kind: 'double-start',
        level: 'warning',
        message: "Timer 'Timer A' can't be started twice. Use .stop() to stop it first.",
      }]);
      expect(registry.generateReport()).toHaveLength(0);
      expect(timer.running).toBe(true);

      timer.stop();
      const report = registry.generateReport();
      expect(report).toHaveLength(1);
      expect(report[0].text).toBe('first');
    });

    it('ignores a stop without start with a warning and keeps working', () => {
      const { registry, diagnostics } = testRegistry();
      const timer = new TimerRecorder('Timer A', { registry });
      timer.stop();

      expect(diagnostics).toEqual([{
        kind: 'stop-without-start',
        level: 'warning',
        message: "Timer 'Timer A' hasn't been started yet. Use .start() to start it first.",
      }]);
      expect(registry.generateReport()).toHaveLength(0);

      timer.start();
      timer.stop();
      expect(registry.generateReport()).toHaveLength(1);
      expect(diagnostics).toHaveLength(1);
    });
  });

  // ── Scope guard ─────────────────────────────────────────────────────────

  describe('scope', () => {
    it('times the enclosing block', () => {
      const { registry } = testRegistry({ clock: sequenceClock([5, 9]) });
      const timer = new TimerRecorder('Timer A', { registry });
      {
        using _ = timer.scope('Block A');
        expect(timer.running).toBe(true);
      }
      expect(timer.running).toBe(false);
      expect(timer.blocks).toEqual([{ startTime: 5, stopTime: 9, threadCpuDuration: 0, text: 'Block A' }]);
    });

    it('stops when the block throws', () => {
      const { registry } = testRegistry();
      const timer = new TimerRecorder('Timer A', { registry });
      const run = () => {
        using _ = timer.scope();
        throw new Error('boom');
      };

      expect(run).toThrow('boom');
      expect(timer.running).toBe(false);
      expect(timer.blocks).toHaveLength(1);
    });
  });

  // ── Function wrapper ────────────────────────────────────────────────────

  describe('wrap', () => {
    it('times each synchronous call and passes arguments and result through', () => {
      const { registry } = testRegistry();
      const timer = new TimerRecorder('Timer A', { registry, text: 'sum' });
      const add = timer.wrap((a: number, b: number) => a + b);

      expect(add(2, 3)).toBe(5);
      expect(add(4, 5)).toBe(9);
      expect(timer.blocks.map(b => b.text)).toEqual(['sum', null]);
    });

    it('stops the block when the call throws', () => {
      const { registry } = testRegistry();
      const timer = new TimerRecorder('Timer A', { registry });
      const fail = timer.wrap(() => {
        throw new Error('boom');
      });

      expect(() => fail()).toThrow('boom');
      expect(timer.running).toBe(false);
      expect(timer.blocks).toHaveLength(1);
    });

    it('stops the block when a returned promise resolves', async () => {
      const { registry } = testRegistry();
      const timer = new TimerRecorder('Timer A', { registry });
      let release: (value: string) => void = () => undefined;
      const fetchValue = timer.wrap(() => new Promise<string>((resolve) => { release = resolve; }));

      const pending = fetchValue();
      expect(timer.running).toBe(true);
      expect(timer.blocks).toHaveLength(0);

      release('done');
      await expect(pending).resolves.toBe('done');
      expect(timer.running).toBe(false);
      expect(timer.blocks).toHaveLength(1);
    });

    it('stops the block when a returned promise rejects', async () => {
      const { registry } = testRegistry();
      const timer = new TimerRecorder('Timer A', { registry });
      const fail = timer.wrap(async () => {
        throw new Error('nope');
      });

      await expect(fail()).rejects.toThrow('nope');
      expect(timer.running).toBe(false);
      expect(timer.blocks).toHaveLength(1);
    });

    it('passes a failed child flush to the caller', async () => {
      const dir = makeTempDir();
      try {
        // A regular file where the report directory should be
        writeFileSync(join(dir, 'file'), '');
        const { registry } = testRegistry({ role: 'child', directory: join(dir, 'file', 'sub') });
        const timer = new TimerRecorder('Timer A', { registry });

        expect(() => timer.wrap(() => 'ok')()).toThrow('ENOTDIR');
        await expect(timer.wrap(async () => 'ok')()).rejects.toThrow('ENOTDIR');
        await expect(timer.wrap(async () => {
          throw new Error('nope');
        })()).rejects.toThrow('ENOTDIR');
        expect(timer.running).toBe(false);
        expect(timer.blocks).toHaveLength(3);
      } finally {
        removeDir(dir);
      }
    });

    it('timed() wraps with a fresh recorder', () => {
      const { registry } = testRegistry();
      const double = timed('Timer A', (n: number) => n * 2, { registry, text: 'first call' });

      expect(double(21)).toBe(42);
      expect(registry.generateReport()).toEqual([
        expect.objectContaining({ name: 'Timer A', text: 'first call' }),
      ]);
    });
  });

  it('nests recorders of every kind', () => {
    const { registry } = testRegistry();
    const myFunction = timed('Decorator timer', (i: number) => {
      using _ = new TimerRecorder('Context timer', { registry }).scope();
      const timer = new TimerRecorder('Class timer', { registry });
      timer.start(i);
      timer.stop();
    }, { registry });

    for (let i = 0; i < 2; i++) myFunction(i);

    const report = registry.generateReport();
    expect(report).toHaveLength(6);
    expect(report.map(r => r.name)).toEqual([
      'Decorator timer', 'Decorator timer',
      'Context timer', 'Class timer',
      'Context timer', 'Class timer',
    ]);
    expect(report.filter(r => r.text === '0')).toHaveLength(1);
    expect(report.filter(r => r.text === '1')).toHaveLength(1);
    expect(report.filter(r => r.text === null)).toHaveLength(4);
    expect(new Set(report.map(r => r.thread_id)).size).toBe(1);
  });
});
