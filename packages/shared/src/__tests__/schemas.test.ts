/**
 * Schema Tests
 */

import {
  DEFAULT_BUDGET,
  ValidationError,
  fleetManifestSchema,
  parseAttemptBudget,
  parseProbeTarget,
  parseTargetSpec,
} from '../index.js';

describe('parseTargetSpec', () => {
  it('should parse host, port and path', () => {
    expect(parseTargetSpec('localhost:3000/api/health')).toEqual({
      host: 'localhost',
      port: 3000,
      path: '/api/health',
    });
  });

  it('should default the path to /health', () => {
    expect(parseTargetSpec('10.0.0.5:8080')).toEqual({ host: '10.0.0.5', port: 8080, path: '/health' });
  });

  it('should tolerate an http:// prefix', () => {
    expect(parseTargetSpec('http://localhost:3000/health').host).toBe('localhost');
  });

  it('should accept bracketed IPv6 hosts', () => {
    expect(parseTargetSpec('[::1]:3000').host).toBe('[::1]');
  });

  it('should reject a target without a port', () => {
    expect(() => parseTargetSpec('localhost')).toThrow('Invalid target "localhost": expected host:port[/path]');
  });

  it('should reject an out of range port', () => {
    expect(() => parseTargetSpec('localhost:70000')).toThrow(ValidationError);
  });
});

describe('parseProbeTarget', () => {
  it('should fill defaults and mirror the port inside the container', () => {
    expect(parseProbeTarget({ name: 'app-auth-service', port: 3000 })).toEqual({
      check: 'http',
      name: 'app-auth-service',
      host: 'localhost',
      port: 3000,
      path: '/health',
      containerPort: 3000,
    });
  });

  it('should keep an explicit container port', () => {
    expect(parseProbeTarget({ name: 'web', port: 18080, containerPort: 8080 })).toMatchObject({
      check: 'http',
      port: 18080,
      containerPort: 8080,
    });
  });

  it('should check a target without a port for liveness only', () => {
    expect(parseProbeTarget({ name: 'postgres', host: '10.0.0.5', path: '/ignored' })).toEqual({
      check: 'liveness',
      name: 'postgres',
    });
  });

  it('should reject names that could break out of a shell word', () => {
    expect(() => parseProbeTarget({ name: 'web; rm -rf /', port: 3000 })).toThrow(
      'Invalid probe target: name: Invalid container name',
    );
  });

  it('should reject a path without a leading slash', () => {
    expect(() => parseProbeTarget({ name: 'web', port: 3000, path: 'health' })).toThrow(ValidationError);
  });
});

describe('parseAttemptBudget', () => {
  it('should default to five attempts, five seconds apart', () => {
    expect(parseAttemptBudget()).toEqual({ maxAttempts: 5, delayMs: 5000, probeTimeoutMs: 3000 });
    expect(DEFAULT_BUDGET).toEqual(parseAttemptBudget({}));
  });

  it('should reject zero attempts', () => {
    expect(() => parseAttemptBudget({ maxAttempts: 0 })).toThrow(ValidationError);
  });

  it('should require the probe timeout to be shorter than the delay', () => {
    expect(() => parseAttemptBudget({ delayMs: 1000, probeTimeoutMs: 1000 })).toThrow(
      'Invalid attempt budget: probeTimeoutMs: Probe timeout must be shorter than the delay between attempts',
    );
  });

  it('should allow any timeout for a single attempt', () => {
    expect(parseAttemptBudget({ maxAttempts: 1, delayMs: 0 })).toEqual({
      maxAttempts: 1,
      delayMs: 0,
      probeTimeoutMs: 3000,
    });
  });
});

describe('fleetManifestSchema', () => {
  it('should require at least one service', () => {
    expect(fleetManifestSchema.safeParse({ services: [] }).success).toBe(false);
  });

  it('should accept a minimal manifest', () => {
    const parsed = fleetManifestSchema.parse({ services: [{ name: 'app-auth-service', port: 3000 }] });

    expect(parsed.services).toEqual([{ name: 'app-auth-service', port: 3000 }]);
  });

  it('should accept services without a port', () => {
    const parsed = fleetManifestSchema.parse({
      services: [{ name: 'app-auth-service', port: 3000 }, { name: 'redis' }],
    });

    expect(parsed.services[1]).toEqual({ name: 'redis' });
  });
});
