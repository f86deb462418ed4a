export * from './twilio-client.js';
