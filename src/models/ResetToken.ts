/** Single-use password reset token. Only the SHA-256 hash of the raw token is kept. */
export interface ResetToken {
  id: number;
  userId: number;
  tokenHash: string;
  createdAt: Date;
  expiresAt: Date;
  usedAt: Date | null;
}
