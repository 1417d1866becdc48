import { Injectable, InternalServerErrorException } from '@nestjs/common';
import * as zlib from 'zlib';
import * as crypto from 'crypto';
import { promisify } from 'util';

const deflate = promisify(zlib.deflate);
const inflate = promisify(zlib.inflate);

/** Deflate/inflate and fingerprint task results stored in the task table. */
@Injectable()
export class ContentCodecService {
  async compress(content: string): Promise<Buffer> {
    try {
      return await deflate(content);
    } catch (error) {
      throw new InternalServerErrorException('Failed to compress content', {
        cause: error,
      });
    }
  }

  async decompress(buffer: Buffer): Promise<string> {
    try {
      const result = await inflate(buffer);
      return result.toString('utf8');
    } catch (error) {
      throw new InternalServerErrorException('Failed to decompress content', {
        cause: error,
      });
    }
  }

  calculateHash(content: string): string {
    return crypto.createHash('sha256').update(content).digest('hex');
  }

  async encodeJson(value: unknown): Promise<EncodedPayload> {
    const json = JSON.stringify(value);
    const data = await this.compress(json);
    return {
      data,
      hash: this.calculateHash(json),
      originalSize: Buffer.byteLength(json),
    };
  }

  async decodeJson(data: Buffer, expectedHash: string | null): Promise<unknown> {
    const json = await this.decompress(data);
    if (expectedHash && this.calculateHash(json) !== expectedHash) {
      throw new InternalServerErrorException('Stored content hash mismatch');
    }
    const parsed: unknown = JSON.parse(json);
    return parsed;
  }
}

export interface EncodedPayload {
  data: Buffer;
  hash: string;
  originalSize: number;
}
