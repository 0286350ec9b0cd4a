import jwt from 'jsonwebtoken';
import bcrypt from 'bcrypt';
import * as crypto from 'crypto';
import { AuthUser, Role } from '../models/User';
import { AppConfig } from '../config';

type AuthConfig = AppConfig['auth'];

export const hashPassword = async (password: string, config: AuthConfig): Promise<string> => {
  return bcrypt.hash(password, config.bcryptRounds);
};

export const comparePassword = async (
  password: string,
  hash: string
): Promise<boolean> => {
  return bcrypt.compare(password, hash);
};

export const generateToken = (user: AuthUser, config: AuthConfig): string => {
  return jwt.sign(
    { username: user.username, role: user.role },
    config.jwtSecret,
    { subject: String(user.id), expiresIn: config.jwtExpiresInSeconds }
  );
};

const isRole = (value: unknown): value is Role =>
  Object.values(Role).some((role) => role === value);

export const verifyToken = (token: string, config: AuthConfig): AuthUser | null => {
  try {
    const decoded = jwt.verify(token, config.jwtSecret);
    if (typeof decoded === 'string') {
      return null;
    }

    const id = Number(decoded.sub);
    const { username, role } = decoded;
    if (!Number.isInteger(id) || typeof username !== 'string' || !isRole(role)) {
      return null;
    }
    return { id, username, role };
  } catch (error) {
    return null;
  }
};

export const hashResetToken = (raw: string): string =>
  crypto.createHash('sha256').update(raw, 'utf8').digest('hex');

/** A URL-safe random token; only its hash is ever stored. */
export const generateResetToken = (): { raw: string; hash: string } => {
  const raw = crypto.randomBytes(32).toString('base64url');
  return { raw, hash: hashResetToken(raw) };
};
