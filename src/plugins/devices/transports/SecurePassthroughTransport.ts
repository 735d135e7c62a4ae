import { createCipheriv, createDecipheriv, createHash, generateKeyPair } from 'crypto';
import { promisify } from 'util';
import type { AxiosInstance, AxiosResponse } from 'axios';
import { pki, util } from 'node-forge';
import { z } from 'zod';
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

const RSA_KEY_BITS = 1024;

const generateRsaKeyPair = promisify(generateKeyPair);

const HandshakeReplySchema = z.object({
  error_code: z.number(),
  result: z.object({ key: z.string() }).optional(),
});

const PassthroughReplySchema = z.object({
  error_code: z.number(),
  result: z.object({ response: z.string() }).optional(),
});

const InnerReplySchema = z
  .object({
    error_code: z.number(),
    result: z.unknown().optional(),
  })
  .passthrough();

const LoginResultSchema = z.object({ token: z.string() });

interface SessionCipher {
  key: Buffer;
  iv: Buffer;
}

/**
 * Login parameters: base64 of the sha1 hex digest of the username, base64 of the password
 */
export function securePassthroughLoginParams(credentials: Credentials): {
  username: string;
  password: string;
} {
  const usernameDigest = createHash('sha1').update(credentials.username).digest('hex');
  return {
    username: Buffer.from(usernameDigest).toString('base64'),
    password: Buffer.from(credentials.password).toString('base64'),
  };
}

export function encryptPassthrough(cipher: SessionCipher, plaintext: string): string {
  const aes = createCipheriv('aes-128-cbc', cipher.key, cipher.iv);
  return Buffer.concat([aes.update(plaintext, 'utf8'), aes.final()]).toString('base64');
}

export function decryptPassthrough(cipher: SessionCipher, encoded: string): string {
  const aes = createDecipheriv('aes-128-cbc', cipher.key, cipher.iv);
  return Buffer.concat([aes.update(Buffer.from(encoded, 'base64')), aes.final()]).toString('utf8');
}

/**
 * Legacy Tapo transport: RSA key exchange, then every request wrapped in an
 * AES-encrypted securePassthrough envelope posted to /app.
 */
export class SecurePassthroughTransport implements DeviceTransport {
  readonly scheme = 'securePassthrough' as const;

  private readonly http: AxiosInstance;
  private readonly credentials: Credentials;
  private cipher?: SessionCipher;
  private cookie?: string;
  private token?: string;

  constructor(options: TransportOptions) {
    this.credentials = options.credentials;
    this.http = createHttpClient({
      baseURL: `http://${options.address}`,
      timeout: options.timeoutMs,
    });
  }

  async handshake(): Promise<void> {
    const keyPair = await generateRsaKeyPair('rsa', {
      modulusLength: RSA_KEY_BITS,
      publicKeyEncoding: { type: 'spki', format: 'pem' },
      privateKeyEncoding: { type: 'pkcs1', format: 'pem' },
    });
    const publicKey = keyPair.publicKey;

    const response = await this.post(
      { method: 'handshake', params: { key: publicKey, requestTimeMils: 0 } },
      'handshake'
    );

    const reply = HandshakeReplySchema.safeParse(response.data);
    if (!reply.success || !reply.data.result) {
      const code = reply.success ? reply.data.error_code : 'malformed';
      throw new DeviceError('PROTOCOL_SHAPE', `handshake rejected (error_code ${code})`);
    }

    let keyMaterial: Buffer;
    try {
      // Node 20 refuses RSA PKCS#1 v1.5 private decryption
      const decrypted = pki.privateKeyFromPem(keyPair.privateKey).decrypt(
        util.decode64(reply.data.result.key),
        'RSAES-PKCS1-V1_5'
      );
      keyMaterial = Buffer.from(decrypted, 'binary');
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      throw new DeviceError('PROTOCOL_SHAPE', `handshake key could not be decrypted: ${message}`);
    }

    if (keyMaterial.length < 32) {
      throw new DeviceError('PROTOCOL_SHAPE', `handshake key is ${keyMaterial.length} bytes`);
    }

    this.cipher = { key: keyMaterial.subarray(0, 16), iv: keyMaterial.subarray(16, 32) };
    this.cookie = extractSessionCookie(response.headers['set-cookie']);
  }

  async login(): Promise<void> {
    const reply = await this.passthrough(
      {
        method: 'login_device',
        params: securePassthroughLoginParams(this.credentials),
        requestTimeMils: Date.now(),
      },
      'login'
    );

    const result = LoginResultSchema.safeParse(reply.result);
    if (!result.success) {
      throw new DeviceError('AUTH_FAILURE', 'login reply carried no session token');
    }
    this.token = result.data.token;
  }

  async send(request: Record<string, unknown>): Promise<unknown> {
    if (!this.token) {
      throw new DeviceError('AUTH_FAILURE', 'request attempted before login');
    }
    return this.passthrough({ ...request, requestTimeMils: Date.now() }, 'request');
  }

  close(): void {
    this.cipher = undefined;
    this.cookie = undefined;
    this.token = undefined;
  }

  private async passthrough(
    request: Record<string, unknown>,
    step: TransportStep
  ): Promise<z.infer<typeof InnerReplySchema>> {
    if (!this.cipher) {
      throw new DeviceError('PROTOCOL_SHAPE', `${step} attempted before handshake`);
    }

    const response = await this.post(
      {
        method: 'securePassthrough',
        params: { request: encryptPassthrough(this.cipher, JSON.stringify(request)) },
      },
      step
    );

    const outer = PassthroughReplySchema.safeParse(response.data);
    if (!outer.success || !outer.data.result) {
      const code = outer.success ? outer.data.error_code : 'malformed';
      throw new DeviceError(
        step === 'login' ? 'AUTH_FAILURE' : 'PROTOCOL_SHAPE',
        `${step} rejected (error_code ${code})`
      );
    }

    let text: string;
    try {
      text = decryptPassthrough(this.cipher, outer.data.result.response);
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      throw new DeviceError('PROTOCOL_SHAPE', `${step} reply could not be decrypted: ${message}`);
    }

    const inner = InnerReplySchema.safeParse(parseJson(text, step));
    if (!inner.success) {
      throw new DeviceError('PROTOCOL_SHAPE', `${step} reply has no error_code`);
    }
    if (inner.data.error_code !== 0) {
      throw new DeviceError(
        step === 'login' ? 'AUTH_FAILURE' : 'PROTOCOL_SHAPE',
        `${step} rejected (error_code ${inner.data.error_code})`
      );
    }

    return inner.data;
  }

  private async post(body: Record<string, unknown>, step: TransportStep): Promise<AxiosResponse<unknown>> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.cookie) {
      headers.Cookie = this.cookie;
    }

    try {
      return await this.http.post<unknown>('/app', body, {
        params: this.token ? { token: this.token } : undefined,
        headers,
      });
    } catch (error) {
      throw toDeviceError(error, step);
    }
  }
}
