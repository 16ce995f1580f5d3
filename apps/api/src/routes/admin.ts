import express from 'express';
import { sendError } from '../lib/errors';
import { parseBody, updateRoleBody } from '../lib/validation';
import type { AccessGate } from '../middleware/auth';
import { parsePageRequest, type AdminService } from '../services/admin';

// every route here requires an admin token
export function adminRoutes(admin: AdminService, gate: AccessGate) {
  const router = express.Router();
  const adminOnly = { role: 'admin' } as const;

  // GET /admin/users?page=1&limit=10
  router.get(
    '/users',
    gate.protect(async (req, res) => {
      try {
        return res.json(await admin.listUsers(parsePageRequest(req.query)));
      } catch (err) {
        return sendError(res, err, 'list users');
      }
    }, adminOnly)
  );

  // DELETE /admin/users/:id
  router.delete(
    '/users/:id',
    gate.protect(async (req, res) => {
      try {
        await admin.deleteUser(req.params.id);
        return res.json({ message: 'User deleted successfully' });
      } catch (err) {
        return sendError(res, err, 'delete user');
      }
    }, adminOnly)
  );

  // PUT /admin/users/:id/role { role }
  router.put(
    '/users/:id/role',
    gate.protect(async (req, res) => {
      try {
        const { role } = parseBody(updateRoleBody, req.body);
        await admin.updateUserRole(req.params.id, role);
        return res.json({ message: 'User role updated successfully' });
      } catch (err) {
        return sendError(res, err, 'update role');
      }
    }, adminOnly)
  );

  return router;
}
