import { createCipheriv, createDecipheriv, createHash, randomBytes } from 'crypto';
import type { AxiosInstance, AxiosResponse } from 'axios';
import { DeviceError } from '../../../core/errors';
import { createHttpClient } from '../../../utils/http';
import type { Credentials } from '../../../types/plugin.types';
import {
  DeviceTransport,
  TransportOptions,
  TransportStep,
  extractSessionCookie,
  parseJson,
  toDeviceError,
} from './DeviceTransport';

/**
 * KLAP auth hash generation.
 * 1 = md5 based, used by Kasa firmware; 2 = sha1/sha256 based, used by Tapo firmware.
 */
export type KlapAuthVersion = 1 | 2;

export interface KlapTransportOptions extends TransportOptions {
  authVersion: KlapAuthVersion;
}

const SEED_LENGTH = 16;
const SIGNATURE_LENGTH = 32;
const INT32_MAX = 0x7fffffff;
const INT32_MIN = -0x80000000;

function sha256(...parts: Buffer[]): Buffer {
  return createHash('sha256').update(Buffer.concat(parts)).digest();
}

function digest(algorithm: 'md5' | 'sha1', value: Buffer | string): Buffer {
  return createHash(algorithm).update(value).digest();
}

function int32Bytes(value: number): Buffer {
  const bytes = Buffer.alloc(4);
  bytes.writeInt32BE(value);
  return bytes;
}

export function klapAuthHash(credentials: Credentials, version: KlapAuthVersion): Buffer {
  if (version === 1) {
    return digest(
      'md5',
      Buffer.concat([digest('md5', credentials.username), digest('md5', credentials.password)])
    );
  }
  return sha256(digest('sha1', credentials.username), digest('sha1', credentials.password));
}

/**
 * Hash the device must present in its handshake1 reply
 */
export function klapServerHash(
  localSeed: Buffer,
  remoteSeed: Buffer,
  authHash: Buffer,
  version: KlapAuthVersion
): Buffer {
  return version === 1 ? sha256(localSeed, authHash) : sha256(localSeed, remoteSeed, authHash);
}

/**
 * Hash the client proves its credentials with in handshake2
 */
export function klapClientHash(
  localSeed: Buffer,
  remoteSeed: Buffer,
  authHash: Buffer,
  version: KlapAuthVersion
): Buffer {
  return version === 1 ? sha256(remoteSeed, authHash) : sha256(remoteSeed, localSeed, authHash);
}

/**
 * Symmetric state derived from both seeds once the handshake completes.
 * Every request advances the sequence number, which also forms the tail of the IV.
 */
export class KlapSession {
  private readonly key: Buffer;
  private readonly ivPrefix: Buffer;
  private readonly signatureKey: Buffer;
  private seq: number;

  constructor(localSeed: Buffer, remoteSeed: Buffer, authHash: Buffer) {
    const seeds = Buffer.concat([localSeed, remoteSeed, authHash]);
    const ivHash = sha256(Buffer.from('iv'), seeds);

    this.key = sha256(Buffer.from('lsk'), seeds).subarray(0, 16);
    this.ivPrefix = ivHash.subarray(0, 12);
    this.seq = ivHash.readInt32BE(28);
    this.signatureKey = sha256(Buffer.from('ldk'), seeds).subarray(0, 28);
  }

  get sequence(): number {
    return this.seq;
  }

  encrypt(plaintext: string): { payload: Buffer; seq: number } {
    this.seq = this.seq === INT32_MAX ? INT32_MIN : this.seq + 1;
    const seqBytes = int32Bytes(this.seq);

    const cipher = createCipheriv('aes-128-cbc', this.key, this.iv(seqBytes));
    const ciphertext = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);
    const signature = sha256(this.signatureKey, seqBytes, ciphertext);

    return { payload: Buffer.concat([signature, ciphertext]), seq: this.seq };
  }

  decrypt(payload: Buffer, seq: number): string {
    const decipher = createDecipheriv('aes-128-cbc', this.key, this.iv(int32Bytes(seq)));
    const body = payload.subarray(SIGNATURE_LENGTH);
    return Buffer.concat([decipher.update(body), decipher.final()]).toString('utf8');
  }

  private iv(seqBytes: Buffer): Buffer {
    return Buffer.concat([this.ivPrefix, seqBytes]);
  }
}

interface HandshakeState {
  localSeed: Buffer;
  remoteSeed: Buffer;
  serverHash: Buffer;
}

/**
 * KLAP transport: two-step seed exchange over /app/handshake1 and /app/handshake2,
 * then AES-encrypted requests to /app/request.
 */
export class KlapTransport implements DeviceTransport {
  readonly scheme = 'klap' as const;

  private readonly http: AxiosInstance;
  private readonly authHash: Buffer;
  private readonly authVersion: KlapAuthVersion;
  private handshakeState?: HandshakeState;
  private cookie?: string;
  private session?: KlapSession;

  constructor(options: KlapTransportOptions) {
    this.authVersion = options.authVersion;
    this.authHash = klapAuthHash(options.credentials, options.authVersion);
    this.http = createHttpClient({
      baseURL: `http://${options.address}/app`,
      timeout: options.timeoutMs,
    });
  }

  async handshake(): Promise<void> {
    const localSeed = randomBytes(SEED_LENGTH);
    const response = await this.post('/handshake1', localSeed, 'handshake');
    const body = Buffer.from(response.data);

    if (body.length < SEED_LENGTH + SIGNATURE_LENGTH) {
      throw new DeviceError('PROTOCOL_SHAPE', `handshake1 returned ${body.length} bytes`);
    }

    this.cookie = extractSessionCookie(response.headers['set-cookie']);
    this.handshakeState = {
      localSeed,
      remoteSeed: body.subarray(0, SEED_LENGTH),
      serverHash: body.subarray(SEED_LENGTH, SEED_LENGTH + SIGNATURE_LENGTH),
    };
  }

  async login(): Promise<void> {
    if (!this.handshakeState) {
      throw new DeviceError('PROTOCOL_SHAPE', 'login attempted before handshake');
    }

    const { localSeed, remoteSeed, serverHash } = this.handshakeState;
    const expected = klapServerHash(localSeed, remoteSeed, this.authHash, this.authVersion);

    if (!expected.equals(serverHash)) {
      throw new DeviceError('AUTH_FAILURE', 'device did not accept the configured credentials');
    }

    await this.post(
      '/handshake2',
      klapClientHash(localSeed, remoteSeed, this.authHash, this.authVersion),
      'login'
    );
    this.session = new KlapSession(localSeed, remoteSeed, this.authHash);
  }

  async send(request: Record<string, unknown>): Promise<unknown> {
    if (!this.session) {
      throw new DeviceError('AUTH_FAILURE', 'request attempted before login');
    }

    const { payload, seq } = this.session.encrypt(JSON.stringify(request));
    const response = await this.post('/request', payload, 'request', { seq });

    let text: string;
    try {
      text = this.session.decrypt(Buffer.from(response.data), seq);
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      throw new DeviceError('PROTOCOL_SHAPE', `request reply could not be decrypted: ${message}`);
    }
    return parseJson(text, 'request');
  }

  close(): void {
    this.session = undefined;
    this.handshakeState = undefined;
    this.cookie = undefined;
  }

  private async post(
    path: string,
    body: Buffer,
    step: TransportStep,
    params?: Record<string, number>
  ): Promise<AxiosResponse<ArrayBuffer>> {
    const headers: Record<string, string> = { 'Content-Type': 'application/octet-stream' };
    if (this.cookie) {
      headers.Cookie = this.cookie;
    }

    try {
      return await this.http.post<ArrayBuffer>(path, body, {
        params,
        headers,
        responseType: 'arraybuffer',
      });
    } catch (error) {
      throw toDeviceError(error, step);
    }
  }
}
