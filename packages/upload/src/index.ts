/**
 * @sftp-writer/upload
 * 
 * SFTP upload layer.
 * 
 * Features:
 * - Private key parsing with algorithm fallback
 * - Classified connection failures
 * - Date-stamped destination paths
 * - Retrying uploads over a single session
 */

export {
  parsePrivateKey,
  algorithmForKeyType,
  DEFAULT_KEY_PARSERS,
  type KeyParser,
  type ParsePrivateKeyOptions,
} from './keys.js';

export {
  ConnectionManager,
  ConnectionLostError,
  SftpSession,
  buildConnectConfig,
  classifyConnectionError,
  createSsh2Transport,
  type ConnectOptions,
  type SftpChannel,
  type SshTransport,
  type TransportFactory,
} from './connection.js';

export { resolveDestination, type DestinationOptions } from './destination.js';

export {
  RetryingUploader,
  uploadFile,
  isRetryableUploadError,
  isConnectionLossError,
  isNotFoundError,
  isPermissionError,
  MAX_RETRIES,
  SFTP_STATUS,
  type UploadSession,
  type UploaderOptions,
} from './uploader.js';

export {
  UploadOrchestrator,
  type ManagedSession,
  type UploadedFile,
  type UploadSummary,
  type UploadOrchestratorOptions,
} from './orchestrator.js';
