/**
 * ServerConfig Unit Tests
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { DEFAULT_PORT, loadServerConfig } from './ServerConfig.js';

test('ServerConfig - Defaults when unset', () => {
  assert.deepStrictEqual(loadServerConfig({}), { port: DEFAULT_PORT, host: '0.0.0.0' });
  assert.strictEqual(DEFAULT_PORT, 9999);
});

test('ServerConfig - Empty values count as unset', () => {
  assert.deepStrictEqual(loadServerConfig({ PORT: '', HOST: '' }), { port: 9999, host: '0.0.0.0' });
});

test('ServerConfig - Reads port and host', () => {
  assert.deepStrictEqual(loadServerConfig({ PORT: '8080', HOST: '127.0.0.1' }), { port: 8080, host: '127.0.0.1' });
});

test('ServerConfig - Rejects bad ports', () => {
  assert.throws(() => loadServerConfig({ PORT: 'abc' }), /Invalid server environment: PORT must be a number/);
  assert.throws(() => loadServerConfig({ PORT: '80.5' }), /PORT must be an integer/);
  assert.throws(() => loadServerConfig({ PORT: '70000' }), /PORT must be between 0 and 65535/);
});
