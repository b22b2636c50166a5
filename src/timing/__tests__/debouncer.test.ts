/**
 * Tests for the Debouncer gate.
 */

import { describe, it, expect } from 'vitest';
import { Debouncer } from '../debouncer';

describe('Debouncer', () => {
  it('should grant the first acquisition', () => {
    const debouncer = new Debouncer(1000);
    expect(debouncer.tryAcquire(5000)).toBe(true);
    expect(debouncer.getLastGrantedAt()).toBe(5000);
  });

  it('should deny within the window and grant after it', () => {
    const debouncer = new Debouncer(1000);
    expect(debouncer.tryAcquire(0)).toBe(true);
    expect(debouncer.tryAcquire(500)).toBe(false);
    expect(debouncer.tryAcquire(999)).toBe(false);
    expect(debouncer.tryAcquire(1001)).toBe(true);
  });

  it('should grant exactly at the window boundary', () => {
    const debouncer = new Debouncer(1000);
    debouncer.tryAcquire(0);
    expect(debouncer.tryAcquire(1000)).toBe(true);
  });

  it('should not move the window on a denied call', () => {
    const debouncer = new Debouncer(1000);
    debouncer.tryAcquire(0);
    debouncer.tryAcquire(900);
    expect(debouncer.getLastGrantedAt()).toBe(0);
    expect(debouncer.tryAcquire(1000)).toBe(true);
  });

  it('should grant only once for back-to-back calls in the same tick', () => {
    const debouncer = new Debouncer(1000);
    const results = [debouncer.tryAcquire(42), debouncer.tryAcquire(42), debouncer.tryAcquire(42)];
    expect(results).toEqual([true, false, false]);
  });

  it('should grant again after reset', () => {
    const debouncer = new Debouncer(1000);
    debouncer.tryAcquire(0);
    debouncer.reset();
    expect(debouncer.tryAcquire(10)).toBe(true);
  });

  it('should reject a non-positive window', () => {
    expect(() => new Debouncer(0)).toThrow('Debounce window must be a positive number');
    expect(() => new Debouncer(-5)).toThrow();
  });
});
