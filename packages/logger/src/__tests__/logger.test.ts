/**
 * Logger Tests
 */

import { createAppLogger, maskSensitiveData } from '../index.js';
import { jsonFormat, maskFormat } from '../transports.js';

describe('maskSensitiveData', () => {
  it('should partially reveal long secrets', () => {
    expect(maskSensitiveData({ password: 'test-secret-value' })).toEqual({ password: 'test****alue' });
  });

  it('should fully mask short secrets', () => {
    expect(maskSensitiveData({ token: 'short' })).toEqual({ token: '****' });
  });

  it('should recurse into nested objects and arrays', () => {
    expect(
      maskSensitiveData({
        host: 'localhost',
        ssh: { username: 'root', passphrase: 'test-secret' },
        services: [{ name: 'app-auth-service', authorization: 'Bearer x' }],
      }),
    ).toEqual({
      host: 'localhost',
      ssh: { username: 'root', passphrase: 'test****cret' },
      services: [{ name: 'app-auth-service', authorization: '****' }],
    });
  });

  it('should pass key paths through', () => {
    expect(maskSensitiveData({ privateKeyPath: '/home/deploy/.ssh/id_rsa' })).toEqual({
      privateKeyPath: '/home/deploy/.ssh/id_rsa',
    });
  });

  it('should leave primitives alone', () => {
    expect(maskSensitiveData('text')).toBe('text');
    expect(maskSensitiveData(null)).toBeNull();
  });
});

describe('maskFormat', () => {
  it('should mask sensitive fields at any meta key', () => {
    const out = maskFormat().transform({
      level: 'info',
      message: 'connecting',
      password: 'test-secret-value',
      ssh: { host: 'app.internal', passphrase: 'test-secret' },
      attempt: 2,
    });

    expect(out).toEqual({
      level: 'info',
      message: 'connecting',
      password: 'test****alue',
      ssh: { host: 'app.internal', passphrase: 'test****cret' },
      attempt: 2,
    });
  });
});

describe('jsonFormat', () => {
  it('should stamp service and version and mask secrets', () => {
    const out = jsonFormat('readycheck', '1.2.3').transform({ level: 'info', message: 'ready', token: 'abc' });
    if (typeof out === 'boolean') throw new Error('entry was filtered');

    const line: unknown = JSON.parse(String(Reflect.get(out, Symbol.for('message'))));

    expect(line).toMatchObject({
      level: 'info',
      message: 'ready',
      token: '****',
      service: 'readycheck',
      version: '1.2.3',
    });
  });
});

describe('createAppLogger', () => {
  it('should use the requested level', () => {
    const logger = createAppLogger({ level: 'debug', silent: true });

    expect(logger.level).toBe('debug');
    expect(logger.transports).toHaveLength(1);
  });

  it('should default to info', () => {
    expect(createAppLogger({ silent: true }).level).toBe('info');
  });
});
