export { IdentityAdapter, requirePrincipal } from './identity_adapter';
export type {
  IIdentityAdapter,
  IdentityAdapterDependencies,
  Principal,
  RegisterPrincipalOptions,
  UserProfile,
} from './identity_adapter.types';
