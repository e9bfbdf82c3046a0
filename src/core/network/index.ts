export { Endpoint, EndpointState, sourceIpOf } from './Endpoint';
export type { BoundAddress, ConnectionHandler, ConnectionListener, EndpointConfig, EndpointOptions } from './Endpoint';
export { SecureChannel, echoHandler } from './SecureChannel';
export type { ChannelOptions, PayloadHandler } from './SecureChannel';
export { SocketReader } from './SocketReader';
export { encodeFrame, readFrame, writeFrame } from './framing';
export type { FrameInspector, FrameReadResult } from './framing';
