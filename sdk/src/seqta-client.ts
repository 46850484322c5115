import { promises as fs } from 'fs';
import path from 'path';
import axios, { AxiosInstance } from 'axios';
import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { logger, MonitorError } from '@attendance-monitor/utils';
import {
  AttendanceRecord,
  AttendanceResponse,
  attendanceResponseSchema,
  describeIssues,
} from './schemas.js';

export interface SeqtaClientOptions {
  apiUrl: string;
  username: string;
  password: string;
  timeoutMs?: number;
  http?: AxiosInstance;
}

export interface AttendanceSource {
  getAttendance(date: string, options?: { cacheJsonPath?: string }): Promise<AttendanceRecord[]>;
}

export interface ParsedAttendance {
  /** The XML document as parsed, before validation. */
  document: unknown;
  response: AttendanceResponse;
}

// Every <data> element under <response> is one record
const parser = new XMLParser({
  ignoreAttributes: true,
  parseTagValue: false,
  trimValues: true,
  isArray: (_tagName, jPath) => jPath === 'response.data',
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function attendanceUrl(apiUrl: string, date: string): string {
  const separator = apiUrl.includes('?') ? '&' : '?';
  return `${apiUrl}${separator}date=${encodeURIComponent(date)}`;
}

/** Parses the XML body into a plain document without checking its fields. */
export function readAttendanceXml(xml: string): unknown {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    throw new MonitorError('INVALID_RESPONSE', `SEQTA returned malformed XML: ${validation.err.msg}`, {
      line: validation.err.line,
    });
  }
  return parser.parse(xml);
}

export function validateAttendanceDocument(document: unknown): AttendanceResponse {
  const root = isRecord(document) ? document.response : undefined;
  if (!isRecord(root)) {
    throw new MonitorError('INVALID_RESPONSE', 'SEQTA response has no <response> root element');
  }

  const result = attendanceResponseSchema.safeParse(root);
  if (!result.success) {
    throw new MonitorError('INVALID_RESPONSE', `Unexpected SEQTA attendance payload: ${describeIssues(result.error)}`, {
      issues: result.error.issues.length,
    });
  }
  return result.data;
}

export function parseAttendanceXml(xml: string): ParsedAttendance {
  const document = readAttendanceXml(xml);
  return { document, response: validateAttendanceDocument(document) };
}

export class SeqtaClient implements AttendanceSource {
  private http: AxiosInstance;
  private options: SeqtaClientOptions;

  constructor(options: SeqtaClientOptions) {
    this.options = options;
    this.http = options.http ?? axios.create({ timeout: options.timeoutMs ?? 60_000 });
  }

  async getAttendance(date: string, options?: { cacheJsonPath?: string }): Promise<AttendanceRecord[]> {
    const response = await this.getAttendanceResponse(date, options);
    return response.data;
  }

  async getAttendanceResponse(date: string, options?: { cacheJsonPath?: string }): Promise<AttendanceResponse> {
    const url = attendanceUrl(this.options.apiUrl, date);
    logger.debug('Requesting SEQTA attendance', { url });

    const body = await this.fetchXml(url);
    const document = readAttendanceXml(body);

    // The cache holds the document as received, valid or not
    if (options?.cacheJsonPath) {
      await fs.mkdir(path.dirname(options.cacheJsonPath), { recursive: true });
      await fs.writeFile(options.cacheJsonPath, JSON.stringify(document));
      logger.debug('Cached SEQTA document as JSON', { path: options.cacheJsonPath });
    }

    const response = validateAttendanceDocument(document);

    logger.info(`Received ${response.data.length} attendance records`, { date, timestamp: response.timestamp });
    return response;
  }

  private async fetchXml(url: string): Promise<string> {
    try {
      const response = await this.http.get(url, {
        auth: { username: this.options.username, password: this.options.password },
        responseType: 'text',
        headers: { Accept: 'application/xml' },
      });
      if (response.status < 200 || response.status >= 300) {
        throw new MonitorError('HTTP_ERROR', `SEQTA request failed with status ${response.status}`, {
          url,
          status: response.status,
        });
      }

      const data: unknown = response.data;
      if (typeof data !== 'string') {
        throw new MonitorError('INVALID_RESPONSE', 'SEQTA response body is not text', { url });
      }
      return data;
    } catch (error) {
      if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        throw new MonitorError(
          'HTTP_ERROR',
          status ? `SEQTA request failed with status ${status}` : `SEQTA request failed: ${error.message}`,
          { url, status }
        );
      }
      throw error;
    }
  }
}
