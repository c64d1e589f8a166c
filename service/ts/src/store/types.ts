export type { ProfileStore } from './contracts/store.js';
export type { ProfileScope, ProfileIdentifiers, ProfileWriteInput } from './contracts/profiles.js';

export { UserLookupError, CardConflictError } from './errors.js';
