// route exports
export { jwksRouteHandler } from './routes/jwks.route.js';
