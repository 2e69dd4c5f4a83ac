export * from './types';
export { TcpTransport } from './tcp-transport';
