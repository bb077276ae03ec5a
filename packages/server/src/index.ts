export { createApp, startServer, statusForError } from './app.js';
