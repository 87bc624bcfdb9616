import { describe, it, expect } from 'vitest';
import { API_VERSION, buildServer, createServices, getSchedulingConfig } from '../src/index';

describe('@study-cadence/api', () => {
  it('should export the version', () => {
    expect(API_VERSION).toBe('0.1.0');
  });

  it('should export the server factory and services', () => {
    expect(typeof buildServer).toBe('function');
    expect(typeof createServices).toBe('function');
    expect(typeof getSchedulingConfig).toBe('function');
  });
});
