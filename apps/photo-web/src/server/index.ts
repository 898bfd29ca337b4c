export { createServer, type ServerOptions } from './create-server';
export type { PhotoWebFastifyInstance, RouteSurface } from './fastify';
