import express from 'express';
import { sendError } from '../lib/errors';
import type { AccessGate } from '../middleware/auth';
import type { ProfileService } from '../services/profile';

export function userRoutes(profiles: ProfileService, gate: AccessGate) {
  const router = express.Router();

  // GET /user/profile
  router.get(
    '/profile',
    gate.protect(async (_req, res, principal) => {
      try {
        return res.json(await profiles.getProfile(principal));
      } catch (err) {
        return sendError(res, err, 'profile GET');
      }
    })
  );

  // PUT /user/profile { email?, password? }
  router.put(
    '/profile',
    gate.protect(async (req, res, principal) => {
      try {
        await profiles.updateProfile(principal, req.body);
        return res.json({ message: 'Profile updated successfully' });
      } catch (err) {
        return sendError(res, err, 'profile PUT');
      }
    })
  );

  return router;
}
