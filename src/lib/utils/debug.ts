/**
 * Debug logging for acme-register
 *
 * Output is disabled unless the DEBUG environment variable selects a namespace:
 *
 * DEBUG=acme-register:* - All debug output
 * DEBUG=acme-register:http - Only HTTP exchanges
 * DEBUG=acme-register:nonce - Only replay-nonce acquisition
 * DEBUG=acme-register:account - Only the registration state machine
 * DEBUG=acme-register:store - Only credential persistence
 */

import debug from 'debug';

const root = debug('acme-register');

export const debugHttp = root.extend('http');
export const debugNonce = root.extend('nonce');
export const debugAccount = root.extend('account');
export const debugStore = root.extend('store');
