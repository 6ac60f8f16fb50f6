export { WriteAheadCache } from './wal-cache';
