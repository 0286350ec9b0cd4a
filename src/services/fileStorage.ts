import { v4 as uuidv4 } from 'uuid';
import * as crypto from 'crypto';

export interface FileMetadata {
  id: string;
  originalName: string;
  mimeType: string;
  size: number;
  uploadedAt: Date;
  uploadedBy: number;
}

export interface UploadedFile {
  originalname: string;
  mimetype: string;
  size: number;
  buffer: Buffer;
}

export class FileStorageService {
  private files: Map<string, { metadata: FileMetadata; buffer: Buffer }> = new Map();

  private allowedMimeTypes = [
    'image/jpeg',
    'image/jpg',
    'image/png',
    'image/gif',
    'image/webp'
  ];

  constructor(
    private readonly signingSecret: string,
    private readonly maxFileSize: number,
    private readonly now: () => number = Date.now
  ) {}

  validateFileType(mimeType: string): boolean {
    return this.allowedMimeTypes.includes(mimeType);
  }

  validateFileSize(size: number): boolean {
    return size <= this.maxFileSize;
  }

  getAllowedMimeTypes(): string[] {
    return [...this.allowedMimeTypes];
  }

  async storeFile(file: UploadedFile, userId: number): Promise<FileMetadata> {
    const fileId = uuidv4();

    const metadata: FileMetadata = {
      id: fileId,
      originalName: file.originalname,
      mimeType: file.mimetype,
      size: file.size,
      uploadedAt: new Date(this.now()),
      uploadedBy: userId
    };

    this.files.set(fileId, {
      metadata,
      buffer: file.buffer
    });

    console.log(`📎 File stored: ${file.originalname} (${fileId})`);
    return metadata;
  }

  deleteFile(fileId: string): boolean {
    return this.files.delete(fileId);
  }

  private sign(fileId: string, expiryTime: number): string {
    return crypto
      .createHmac('sha256', this.signingSecret)
      .update(`${fileId}-${expiryTime}`)
      .digest('hex')
      .substring(0, 16);
  }

  generateDownloadUrl(fileId: string, expiresIn: number = 3600): string {
    const expiryTime = this.now() + expiresIn * 1000;
    const signature = this.sign(fileId, expiryTime);
    return `/api/files/${fileId}/download?token=${signature}&expires=${expiryTime}`;
  }

  verifyDownloadUrl(fileId: string, token: string, expires: number): boolean {
    if (!Number.isFinite(expires) || this.now() > expires) {
      return false;
    }

    const expected = Buffer.from(this.sign(fileId, expires));
    const received = Buffer.from(token);
    return expected.length === received.length && crypto.timingSafeEqual(expected, received);
  }

  getFile(fileId: string): { metadata: FileMetadata; buffer: Buffer } | undefined {
    return this.files.get(fileId);
  }
}
