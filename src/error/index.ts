export { ArgumentError } from './ArgumentError';
export { MergeError } from './MergeError';
export { NotFoundError } from './NotFoundError';
export { StoreError } from './StoreError';
export { ValidationError } from './ValidationError';
