import { describe, it, expect } from 'vitest';
import { SampleWindow } from '../../../src/core/sample-window.js';

describe('SampleWindow', () => {
  it('returns samples oldest first before it fills', () => {
    const window = new SampleWindow(3);
    window.push(1);
    window.push(2);

    expect(window.size).toBe(2);
    expect(window.toArray()).toEqual([1, 2]);
  });

  it('overwrites the oldest sample once full', () => {
    const window = new SampleWindow(3);
    for (const value of [1, 2, 3, 4, 5]) {
      window.push(value);
    }

    expect(window.size).toBe(3);
    expect(window.toArray()).toEqual([3, 4, 5]);
  });

  it('returns a copy', () => {
    const window = new SampleWindow(2);
    window.push(1);
    window.toArray().push(99);

    expect(window.toArray()).toEqual([1]);
  });
});
