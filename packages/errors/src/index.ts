/**
 * Errors module - fault kinds, fault categories and terminal send errors
 */

export { BrokerLinkError, FaultCategory, type BrokerLinkErrorOptions } from './types.js';

export {
  TransportFault,
  OperationTimeoutError,
  ServerBusyError,
  ServerTooBusyError,
  MessagingCommunicationError,
  CommunicationError,
  ProtocolError,
  SocketError,
  UnauthorizedAccessError,
  ServerError,
  EndpointNotFoundError,
  type SocketErrorCode,
} from './faults.js';

export {
  SendCancelledError,
  TransportDisposedError,
  ObjectDisposedError,
} from './terminal.js';

export { extractErrorInfo, getErrorCode } from './utils.js';
