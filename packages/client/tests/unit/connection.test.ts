/**
 * Tests for connection.ts
 *
 * Tests cover:
 * - Authentication preconditions and token renewal
 * - Status checking and JSON decoding
 * - Project listing and id lookups
 * - Construction from the environment
 */

import { describe, it, expect, vi } from 'vitest';
import { config as loadDotenv } from 'dotenv';
import {
  AuthenticationError,
  ConfigurationError,
  FormatError,
  PreconditionError,
  RemoteError,
} from '@predictkit/utils';
import { Connection } from '../../src/connection.js';
import {
  connectedFake,
  FakeTransport,
  fakeJwt,
  jsonResponse,
  TEST_HOST,
  TOKEN_URI,
} from '../helpers/fake-transport.js';

vi.mock('dotenv', () => ({ config: vi.fn() }));

const PROJECT_URI = `${TEST_HOST}/api/project/1/`;

describe('Connection', () => {
  describe('authentication', () => {
    it('should refuse requests before authenticate()', async () => {
      const transport = new FakeTransport();
      const connection = new Connection({ host: TEST_HOST, transport });

      expect(connection.isAuthenticated).toBe(false);
      await expect(connection.fetchJson(PROJECT_URI)).rejects.toBeInstanceOf(PreconditionError);
      await expect(connection.reauthenticateIfNeeded()).rejects.toThrow(
        'Not authenticated: call authenticate() first'
      );
      expect(transport.requests).toHaveLength(0);
    });

    it('should renew the token before every request under the always policy', async () => {
      const { connection, transport } = await connectedFake();
      transport.on('GET', PROJECT_URI, jsonResponse({ name: 'p', is_public: true }));

      await connection.fetchJson(PROJECT_URI);

      expect(transport.requests.map((request) => `${request.method} ${request.url}`)).toEqual([
        `POST ${TOKEN_URI}`,
        `POST ${TOKEN_URI}`,
        `GET ${PROJECT_URI}`,
      ]);
      expect(transport.requests[2].headers).toEqual({
        Accept: 'application/json',
        Authorization: 'JWT test-token',
      });
    });

    it('should reuse an unexpired token under the jwt-exp policy', async () => {
      const transport = new FakeTransport()
        .on('POST', TOKEN_URI, jsonResponse({ token: fakeJwt({ exp: 2_000 }) }))
        .on('GET', PROJECT_URI, jsonResponse({ name: 'p', is_public: true }));
      const connection = new Connection({
        host: TEST_HOST,
        transport,
        tokenExpiry: 'jwt-exp',
        now: () => 1_000_000,
      });
      await connection.authenticate('test-user', 'test-password');

      await connection.fetchJson(PROJECT_URI);
      await connection.fetchJson(PROJECT_URI);

      expect(transport.count('POST', TOKEN_URI)).toBe(1);
      expect(transport.count('GET', PROJECT_URI)).toBe(2);
    });

    it('should renew an expired token under the jwt-exp policy', async () => {
      let now = 1_000_000;
      const transport = new FakeTransport()
        .on('POST', TOKEN_URI, jsonResponse({ token: fakeJwt({ exp: 2_000 }) }))
        .on('GET', PROJECT_URI, jsonResponse({ name: 'p', is_public: true }));
      const connection = new Connection({ host: TEST_HOST, transport, tokenExpiry: 'jwt-exp', now: () => now });
      await connection.authenticate('test-user', 'test-password');

      now = 2_000_000;
      await connection.fetchJson(PROJECT_URI);

      expect(transport.count('POST', TOKEN_URI)).toBe(2);
    });

    it('should keep the previous session and credentials when a new login fails', async () => {
      let now = 1_000_000;
      const transport = new FakeTransport()
        .on('POST', TOKEN_URI, jsonResponse({ token: fakeJwt({ exp: 2_000 }) }))
        .on('GET', PROJECT_URI, jsonResponse({ name: 'p', is_public: true }));
      const connection = new Connection({ host: TEST_HOST, transport, tokenExpiry: 'jwt-exp', now: () => now });
      await connection.authenticate('alice', 'alice-password');

      transport.on('POST', TOKEN_URI, { status: 400, body: 'bad credentials' });
      await expect(connection.authenticate('bob', 'wrong-password')).rejects.toBeInstanceOf(AuthenticationError);

      transport.on('POST', TOKEN_URI, jsonResponse({ token: fakeJwt({ exp: 3_000 }) }));
      now = 2_000_000;
      await connection.fetchJson(PROJECT_URI);

      const renewal = transport.requests[transport.requests.length - 2];
      expect(renewal.url).toBe(TOKEN_URI);
      expect(renewal.body).toEqual({
        kind: 'form',
        fields: { username: 'alice', password: 'alice-password' },
      });
    });

    it('should propagate a failed renewal', async () => {
      const { connection, transport } = await connectedFake();
      transport.on('POST', TOKEN_URI, { status: 500, body: 'down' });

      await expect(connection.fetchJson(PROJECT_URI)).rejects.toThrow(
        'Token request failed: status=500. body=down'
      );
      expect(transport.count('GET', PROJECT_URI)).toBe(0);
    });
  });

  describe('responses', () => {
    it('should raise RemoteError on an unexpected status', async () => {
      const { connection, transport } = await connectedFake();
      transport.on('GET', PROJECT_URI, { status: 404, body: '{"detail":"Not found."}' });

      const error = await connection.fetchJson(PROJECT_URI).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RemoteError);
      expect(error).toMatchObject({ uri: PROJECT_URI, expectedStatus: 200, actualStatus: 404 });
      expect(error).toHaveProperty(
        'message',
        `Unexpected status from ${PROJECT_URI}: expected=200, actual=404. body={"detail":"Not found."}`
      );
    });

    it('should raise FormatError on a body that is not JSON', async () => {
      const { connection, transport } = await connectedFake();
      transport.on('GET', PROJECT_URI, { status: 200, body: '<html></html>' });

      const attempt = connection.fetchJson(PROJECT_URI);

      await expect(attempt).rejects.toBeInstanceOf(FormatError);
      await expect(attempt).rejects.toThrow(`Response from ${PROJECT_URI} is not JSON`);
    });

    it('should expect 204 from a delete', async () => {
      const { connection, transport } = await connectedFake();
      transport.on('DELETE', PROJECT_URI, { status: 200, body: '' });

      await expect(connection.deleteResource(PROJECT_URI)).rejects.toMatchObject({
        expectedStatus: 204,
        actualStatus: 200,
      });
    });
  });

  describe('projects', () => {
    it('should build projects pre-seeded from the list response', async () => {
      const { connection, transport } = await connectedFake();
      transport.on(
        'GET',
        `${TEST_HOST}/api/projects/`,
        jsonResponse([
          { url: PROJECT_URI, name: 'Flu Challenge', is_public: true },
          { url: `${TEST_HOST}/api/project/2/`, name: 'Covid Hub', is_public: false },
        ])
      );

      const projects = await connection.projects();

      expect(projects.map((project) => project.id)).toEqual([1, 2]);
      expect(await projects[0].name()).toBe('Flu Challenge');
      expect(await projects[1].isPublic()).toBe(false);
      expect(transport.apiRequests()).toHaveLength(1);
    });

    it('should reject a list element without a url', async () => {
      const { connection, transport } = await connectedFake();
      transport.on('GET', `${TEST_HOST}/api/projects/`, jsonResponse([{ name: 'orphan', is_public: true }]));

      await expect(connection.projects()).rejects.toThrow(
        `List element 0 from ${TEST_HOST}/api/projects/ has no url`
      );
    });

    it('should hand out unfetched proxies by id without a request', async () => {
      const { connection, transport } = await connectedFake();

      const project = connection.project(5);
      const forecast = connection.forecast(71);

      expect(project.uri).toBe(`${TEST_HOST}/api/project/5/`);
      expect(project.isCached).toBe(false);
      expect(forecast.id).toBe(71);
      expect(transport.apiRequests()).toHaveLength(0);
    });

    it('should drop trailing slashes from the host', () => {
      const connection = new Connection({ host: `${TEST_HOST}/`, transport: new FakeTransport() });

      expect(connection.host).toBe(TEST_HOST);
      expect(connection.project(3).uri).toBe(`${TEST_HOST}/api/project/3/`);
    });
  });

  describe('fromEnvironment', () => {
    it('should authenticate with credentials from the given environment', async () => {
      const transport = new FakeTransport().on(
        'POST',
        'http://forecasts.test/api-token-auth/',
        jsonResponse({ token: 'test-token' })
      );

      const connection = await Connection.fromEnvironment({
        env: {
          PREDICTKIT_HOST: 'http://forecasts.test/',
          PREDICTKIT_USERNAME: 'test-user',
          PREDICTKIT_PASSWORD: 'test-password',
        },
        transport,
      });

      expect(connection.host).toBe('http://forecasts.test');
      expect(connection.isAuthenticated).toBe(true);
      expect(loadDotenv).not.toHaveBeenCalled();
    });

    it('should load .env and require credentials when no environment is given', async () => {
      const transport = new FakeTransport();

      await expect(Connection.fromEnvironment({ transport })).rejects.toBeInstanceOf(ConfigurationError);
      expect(loadDotenv).toHaveBeenCalledTimes(1);
      expect(transport.requests).toHaveLength(0);
    });
  });
});
