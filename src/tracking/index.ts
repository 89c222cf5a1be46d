export { ChangeTracker } from './tracker.js';
