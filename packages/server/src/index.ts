/**
 * @account-link/server
 *
 * Composition of the account link service
 */

export { createLinkApplication, type LinkApplication, type LinkApplicationOverrides } from './application.js';
