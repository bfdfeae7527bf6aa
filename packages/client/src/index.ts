/**
 * @predictkit/client - Forecast repository client
 *
 * Connection, session and the lazily cached resource proxies
 * (projects, models, forecasts, units, targets, time zeros, upload jobs).
 */

export * from './connection.js';
export * from './session.js';
export * from './transport.js';
export * from './resources/index.js';
