export {
  createAuthMiddleware,
  identityOf,
  type AuthenticatedUser,
  type JwtPayload,
} from './auth.middleware';
