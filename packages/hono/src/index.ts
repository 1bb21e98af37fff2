export type { JwtHonoConfig } from './interfaces/jwtHonoConfig.js';
export { type JwtContextVariables, secureBearerToken } from './jwtProtection/index.js';
export { jwksRouteHandler } from './jwtRoutes/index.js';
export {
  type BearerAuthorization,
  BearerAuthorizationSchema,
} from './schemas/bearerAuthorization.schema.js';
