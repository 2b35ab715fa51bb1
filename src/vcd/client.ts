import axios, { type AxiosAdapter, type AxiosInstance, type Method } from 'axios';
import https from 'https';
import type { VcdConfig } from '../config.js';
import { authFailure, remoteRejected, toCliError, type CliError } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import { parseXml, type XmlElement } from './xml.js';

export type QueryParams = Record<string, string>;

/**
 * The request surface the resource proxies need. {@link VcdClient} is the
 * HTTP implementation; tests substitute an in-process one.
 */
export interface VcdTransport {
  get(href: string, params?: QueryParams): Promise<XmlElement>;
  post(href: string, body: string, contentType: string): Promise<XmlElement>;
  put(href: string, body: string, contentType: string): Promise<XmlElement>;
  delete(href: string, params?: QueryParams): Promise<XmlElement>;
}

interface VcdSession {
  token: string;
  expires: Date;
}

export interface VcdClientOptions {
  adapter?: AxiosAdapter;
  logger?: Logger;
}

interface RequestOptions {
  params?: QueryParams;
  body?: string;
  contentType?: string;
}

const SESSION_PATH = '/cloudapi/1.0.0/sessions';
// System administrators log in to the provider endpoint.
const PROVIDER_SESSION_PATH = '/cloudapi/1.0.0/sessions/provider';
const SESSION_LIFETIME_MS = 30 * 60 * 1000;

function attributeValue(xml: string, name: string): string | undefined {
  const match = new RegExp(`\\s${name}="([^"]*)"`).exec(xml);
  return match?.[1];
}

/**
 * Extracts message and codes from a vCD error body. Legacy endpoints answer
 * with an XML Error element, cloudapi endpoints with JSON.
 */
function describeErrorBody(data: unknown): { message?: string; minorErrorCode?: string } {
  if (typeof data === 'string') {
    if (data.includes('<Error') || data.includes(':Error')) {
      return { message: attributeValue(data, 'message'), minorErrorCode: attributeValue(data, 'minorErrorCode') };
    }
    try {
      return describeErrorBody(JSON.parse(data));
    } catch {
      return {};
    }
  }
  if (typeof data === 'object' && data !== null) {
    const message = 'message' in data && typeof data.message === 'string' ? data.message : undefined;
    const minorErrorCode =
      'minorErrorCode' in data && typeof data.minorErrorCode === 'string' ? data.minorErrorCode : undefined;
    return { message, minorErrorCode };
  }
  return {};
}

export function toRemoteError(error: unknown): CliError {
  if (!axios.isAxiosError(error) || !error.response) {
    return toCliError(error);
  }
  const status = error.response.status;
  const { message, minorErrorCode } = describeErrorBody(error.response.data);
  const details = { statusCode: status, minorErrorCode };
  if (status === 401 || status === 403) {
    return authFailure(message ?? `Session invalid or expired (HTTP ${status})`, details);
  }
  return remoteRejected(message ?? `Request failed with HTTP ${status}`, details);
}

export class VcdClient implements VcdTransport {
  private http: AxiosInstance;
  private session: VcdSession | null = null;
  private logger: Logger;

  constructor(
    private readonly config: VcdConfig,
    options: VcdClientOptions = {}
  ) {
    this.logger = options.logger ?? createLogger('client');

    // Create axios instance with SSL configuration
    this.http = axios.create({
      baseURL: this.config.baseUrl,
      timeout: this.config.timeoutMs,
      httpsAgent: new https.Agent({
        rejectUnauthorized: this.config.verifySsl,
      }),
      headers: {
        Accept: `application/*+xml;version=${this.config.apiVersion}`,
      },
      responseType: 'text',
      adapter: options.adapter,
    });
  }

  get isAuthenticated(): boolean {
    return this.session !== null && this.session.expires > new Date();
  }

  async ensureAuthenticated(): Promise<void> {
    if (!this.isAuthenticated) {
      await this.authenticate();
    }
  }

  async authenticate(): Promise<void> {
    if (this.config.token) {
      this.useToken(this.config.token);
      return;
    }
    if (!this.config.username || !this.config.org) {
      throw authFailure('Authentication failed: VCD_USERNAME and VCD_ORG must be set (or VCD_TOKEN)');
    }

    this.logger.debug(`creating session for ${this.config.username}@${this.config.org}`);
    try {
      const credentials = Buffer.from(
        `${this.config.username}@${this.config.org}:${this.config.password}`
      ).toString('base64');

      const sessionPath = this.config.org.toLowerCase() === 'system' ? PROVIDER_SESSION_PATH : SESSION_PATH;
      const response = await this.http.post(sessionPath, null, {
        headers: {
          Accept: `application/json;version=${this.config.apiVersion}`,
          Authorization: `Basic ${credentials}`,
        },
      });

      const token: unknown = response.headers['x-vmware-vcloud-access-token'];
      if (typeof token !== 'string' || token === '') {
        throw authFailure('Authentication failed: no access token in session response');
      }
      this.useToken(token);
    } catch (error) {
      const cause = toRemoteError(error);
      if (cause.message.startsWith('Authentication failed')) {
        throw cause;
      }
      throw authFailure(`Authentication failed: ${cause.message}`, cause.details);
    }
  }

  get(href: string, params?: QueryParams): Promise<XmlElement> {
    return this.request('GET', href, { params });
  }

  post(href: string, body: string, contentType: string): Promise<XmlElement> {
    return this.request('POST', href, { body, contentType });
  }

  put(href: string, body: string, contentType: string): Promise<XmlElement> {
    return this.request('PUT', href, { body, contentType });
  }

  delete(href: string, params?: QueryParams): Promise<XmlElement> {
    return this.request('DELETE', href, { params });
  }

  private useToken(token: string): void {
    this.session = {
      token,
      expires: new Date(Date.now() + SESSION_LIFETIME_MS),
    };

    // Set the authorization header for future requests
    this.http.defaults.headers.common['Authorization'] = `Bearer ${token}`;
  }

  private async request(method: Method, href: string, options: RequestOptions): Promise<XmlElement> {
    await this.ensureAuthenticated();
    this.logger.debug(`${method} ${href}`, options.params);

    let data: unknown;
    try {
      const response = await this.http.request({
        method,
        url: href,
        params: options.params,
        data: options.body,
        headers: options.contentType ? { 'Content-Type': options.contentType } : undefined,
      });
      data = response.data;
    } catch (error) {
      const remoteError = toRemoteError(error);
      this.logger.debug(`${method} ${href} failed`, {
        kind: remoteError.kind,
        status: remoteError.details.statusCode,
      });
      throw remoteError;
    }

    if (typeof data !== 'string') {
      throw remoteRejected(`Unexpected ${typeof data} response from ${method} ${href}`);
    }
    return parseXml(data);
  }
}
