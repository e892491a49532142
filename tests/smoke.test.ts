import { describe, it, expect } from 'vitest';
import { ENGINE_VERSION } from '../src/core-engine';
import { DICE_SYSTEM_VERSION } from '../src/dice-system';

describe('Smoke Test', () => {
  it('should verify the test framework is working', () => {
    expect(1 + 1).toBe(2);
  });

  it('should load the engine packages', () => {
    expect(ENGINE_VERSION).toBe('0.1.0');
    expect(DICE_SYSTEM_VERSION).toBe('0.1.0');
  });
});
