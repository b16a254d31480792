export { EventEmitter } from './EventEmitter';
