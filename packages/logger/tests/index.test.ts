/**
 * @fileoverview Tests for the package entry point.
 */

import { describe, it, expect } from 'vitest';
import * as api from '../src/index.js';

describe('logger package exports', () => {
  it('should expose the process handler installer without the exit helper', () => {
    expect(typeof api.attachGlobalHandlers).toBe('function');
    expect(Object.keys(api)).not.toContain('gracefulExit');
  });
});
