export { command as run } from './run';
export { command as validate } from './validate';
