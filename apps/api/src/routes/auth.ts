import express from 'express';
import { sendError } from '../lib/errors';
import type { AccessGate } from '../middleware/auth';
import type { CredentialService } from '../services/credentials';

/** Registration and login, for users and admins. Tokens are only issued on login. */
export function authRoutes(credentials: CredentialService, gate: AccessGate) {
  const router = express.Router();

  // POST /register
  // body: { email, password, role? }
  router.post('/register', async (req, res) => {
    try {
      await credentials.register(req.body);
      return res.status(201).json({ message: 'User registered successfully' });
    } catch (err) {
      return sendError(res, err, 'register');
    }
  });

  // POST /login
  // body: { email, password } -> { token, role }
  router.post('/login', async (req, res) => {
    try {
      const { token, role } = await credentials.login(req.body);
      return res.json({ token, role });
    } catch (err) {
      return sendError(res, err, 'login');
    }
  });

  // POST /admin/register
  // open until the first admin exists, then requires an admin bearer token
  router.post('/admin/register', async (req, res) => {
    try {
      const header = req.headers.authorization;
      const caller = header ? gate.authenticate(header) : undefined;
      await credentials.registerAdmin(req.body, caller);
      return res.status(201).json({ message: 'Admin registered successfully' });
    } catch (err) {
      return sendError(res, err, 'admin register');
    }
  });

  // POST /admin/login
  router.post('/admin/login', async (req, res) => {
    try {
      const { token, role } = await credentials.loginAdmin(req.body);
      return res.json({ token, role });
    } catch (err) {
      return sendError(res, err, 'admin login');
    }
  });

  return router;
}
