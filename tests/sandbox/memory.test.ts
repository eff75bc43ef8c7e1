import { describe, it, expect } from 'vitest';
import { SandboxError } from '../../src/common/errors';
import { MEMORY_LIMIT_BYTES } from '../../src/sandbox/limits';
import {
  MemoryMeter,
  sizeOfEntry,
  sizeOfString,
  sizeOfValue,
} from '../../src/sandbox/memory';
import { NULL, float, int, str } from '../../src/value/value';

describe('memory meter (SANDBOX)', () => {
  it('should default to a 16 MiB limit', () => {
    expect(new MemoryMeter().limit).toBe(16_777_216);
    expect(MEMORY_LIMIT_BYTES).toBe(16 * 1024 * 1024);
  });

  it('should track usage and a monotonic peak', () => {
    const meter = new MemoryMeter(100);
    meter.allocate(60);
    meter.release(50);
    meter.allocate(20);

    expect(meter.usage).toBe(30);
    expect(meter.peak).toBe(60);
  });

  it('should never report negative usage', () => {
    const meter = new MemoryMeter(100);
    meter.allocate(10);
    meter.release(25);
    expect(meter.usage).toBe(0);
  });

  it('should refuse an allocation past the limit without charging it', () => {
    const meter = new MemoryMeter(100);
    meter.allocate(90, 'state');

    let caught: unknown;
    try {
      meter.allocate(11, 'view update');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(SandboxError);
    expect(caught).toMatchObject({
      code: 'MEMORY_EXCEEDED',
      message:
        'Memory limit of 100 bytes exceeded by view update (90 in use, 11 requested)',
    });
    expect(meter.usage).toBe(90);
  });

  it('should allow filling the budget exactly', () => {
    const meter = new MemoryMeter(100);
    meter.allocate(100);
    expect(meter.usage).toBe(100);
  });

  it('should estimate sizes from the value shape', () => {
    expect(sizeOfString('abc')).toBe(22);
    expect(sizeOfValue(int(1))).toBe(24);
    expect(sizeOfValue(float(1.5))).toBe(24);
    expect(sizeOfValue(str('abc'))).toBe(38);
    expect(sizeOfValue(NULL)).toBe(16);
    expect(sizeOfEntry('n', int(0))).toBe(74);
  });
});
