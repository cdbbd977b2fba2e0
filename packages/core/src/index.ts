/**
 * @sftp-writer/core
 * 
 * Core package containing:
 * - Error handling and exit codes
 * - Writer configuration
 * - Input enumeration
 * - Shared types
 */

// Types
export type { UploadTask, ArtifactKind } from './types/task.js';

export {
  KEY_ALGORITHMS,
  type KeyAlgorithm,
  type Credential,
  type KeyCredential,
  type PasswordCredential,
} from './types/credential.js';

// Configuration
export {
  CONFIG_FILE_NAME,
  loadWriterConfig,
  parseWriterConfig,
  type WriterConfig,
  type WriterParameters,
} from './config/writerConfig.js';

// Inputs
export {
  enumerateInputs,
  listInputTables,
  listInputFiles,
  selectLatestFiles,
  parseStagedFileName,
} from './inputs/index.js';

// Errors
export {
  SftpWriterError,
  UserError,
  ConfigurationError,
  InvalidCredentialError,
  AuthenticationFailedError,
  ProtocolOrHostError,
  HostUnreachableError,
  RemotePathNotFoundError,
  RemotePermissionDeniedError,
  EXIT_CODES,
  isUserError,
  exitCodeFor,
  type ExitCode,
} from './errors/index.js';
