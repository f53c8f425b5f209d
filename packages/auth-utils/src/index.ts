export {
  generateAccessToken,
  verifyAccessToken,
  type JwtPayload,
} from './jwt.js';
export { authMiddleware, type AuthRequest } from './middleware.js';
export {
  Permission,
  type PermissionString,
  hasPermission,
  requirePermission,
  resolveKpiCapabilities,
  type CanApproveKpiReports,
  type KpiCapabilities,
} from './permissions.js';
