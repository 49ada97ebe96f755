export { roomsCommand } from './rooms.js';
export { sayCommand } from './say.js';
export { streamCommand, authorOf, type StreamCommandOptions } from './stream.js';
export { uploadCommand } from './upload.js';
