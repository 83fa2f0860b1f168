import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { mkdir, writeFile } from 'node:fs/promises';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { FileUpload } from '../../entities';
import { AppEnv } from '../../utils/env';

export interface IncomingFile {
    originalname: string;
    buffer: Buffer;
    size: number;
    mimetype: string;
}

/**
 * Byte storage for uploaded files. Files land under UPLOADS_DIR with a
 * generated name and are served back at `/uploads/<name>`.
 */
@Injectable()
export class FileUploadService {
    private readonly uploadsDir: string;
    private readonly baseLink: string;
    readonly maxBytes: number;

    constructor(private readonly configService: ConfigService<AppEnv, true>) {
        this.uploadsDir = path.resolve(process.cwd(), this.configService.get('UPLOADS_DIR', { infer: true }));
        this.baseLink = this.configService.get('PUBLIC_BASE_URL', { infer: true }).replace(/\/+$/, '');
        this.maxBytes = this.configService.get('UPLOAD_MAX_BYTES', { infer: true });
    }

    get directory(): string {
        return this.uploadsDir;
    }

    async saveFileUpload(file: IncomingFile): Promise<FileUpload> {
        await mkdir(this.uploadsDir, { recursive: true });

        const uniqueFilename = `${uuidv4()}${path.extname(file.originalname)}`;
        await writeFile(path.join(this.uploadsDir, uniqueFilename), file.buffer);

        return {
            name: path.basename(file.originalname),
            size: file.size,
            contentType: file.mimetype || 'application/octet-stream',
            storageRef: `${this.baseLink}/uploads/${uniqueFilename}`,
            uploadedAt: Date.now(),
        };
    }
}
