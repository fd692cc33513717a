export * from './src/protocol/errors.js';
export * from './src/protocol/messages.js';
export * from './src/protocol/framing.js';
export * from './src/transport/transport.js';
export * from './src/transport/stream-transport.js';
export * from './src/transport/process-transport.js';
export * from './src/transport/websocket-transport.js';
export * from './src/rpc/multiplexer.js';
export * from './src/service/lsp-types.js';
export * from './src/service/uri.js';
export * from './src/service/languages.js';
export * from './src/service/lsp-session.js';
export * from './src/service/session-pool.js';
export * from './src/gateway/tool-registry.js';
export * from './src/gateway/gateway.js';
export * from './src/gateway/stdio-server.js';
export * from './src/gateway/websocket-server.js';
export * from './src/tools/document-tracker.js';
export * from './src/tools/lsp-tools.js';
export * from './src/config.js';
export { startGateway, type GatewayIo, type RunningGateway } from './src/main.js';
export { PRODUCT_NAME, PRODUCT_VERSION } from './src/version.js';
