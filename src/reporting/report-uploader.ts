// report-uploader.ts - POST a finished scan to a collection server
import axios, { AxiosInstance } from 'axios';
import { Logger } from '../common/logger';
import { errorMessage } from '../common/errors';
import { ServerConfig } from '../config/config';
import { ScanResult } from '../types';

export const REPORTS_ENDPOINT = '/api/diagnostics/reports';

export interface UploadReceipt {
  status: number;
  report_id: string | null;
}

export interface ScanUploader {
  upload(scan: ScanResult): Promise<UploadReceipt>;
}

export class ReportUploader implements ScanUploader {
  private logger: Logger;
  private client: AxiosInstance;

  constructor(config: ServerConfig, logger: Logger) {
    this.logger = logger;

    this.client = axios.create({
      baseURL: config.url,
      timeout: config.timeoutMs,
      headers: {
        'Content-Type': 'application/json',
        'Authorization': `Bearer ${config.apiKey}`
      }
    });
  }

  async upload(scan: ScanResult): Promise<UploadReceipt> {
    try {
      const response = await this.client.post<unknown>(REPORTS_ENDPOINT, scan);
      const body = response.data;
      const reportId = typeof body === 'object' && body !== null && 'id' in body && typeof body.id === 'string'
        ? body.id
        : null;

      this.logger.info('Scan report uploaded', { status: response.status, report_id: reportId });
      return { status: response.status, report_id: reportId };
    } catch (error) {
      this.logger.error('Failed to upload scan report', error, { error: errorMessage(error) });
      throw error;
    }
  }
}
