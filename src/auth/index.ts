export {
  StaticCredentialProvider,
  RefreshingCredentialProvider,
  authorizationHeader,
  type Credential,
  type CredentialProvider,
  type GetCredentialOptions,
  type RefreshingCredentialProviderOptions,
} from './credential-provider.js';
export { ClientSession, type ClientSessionOptions } from './session.js';
