export * from './local-git-client.js';
