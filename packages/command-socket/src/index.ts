export { CommandConnection, messageToText } from "./CommandConnection";
export type {
  CommandConnectionOptions,
  ConnectionStatus,
  SocketFactory,
  SocketHandlers,
  SocketLike,
} from "./CommandConnection";
export { defaultConnectionUrl, loadConnectionConfig } from "./config";
export type { ConnectionConfig } from "./config";
