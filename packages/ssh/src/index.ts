/**
 * @deckhand/ssh
 * Ephemeral SSH credentials and remote command execution
 */

export * from './quote.js';
export * from './remote-commands.js';
export * from './credential-bundle.js';
export * from './ssh-session.js';
