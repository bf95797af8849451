export {
  PrivilegeBoundary,
  processIdentitySwitcher,
  describeIdentity,
} from './boundary.js';
export type {
  ExecutionIdentity,
  IdentitySwitcher,
  PrivilegeBoundaryOptions,
} from './boundary.js';
