import axios, { AxiosAdapter, AxiosError, AxiosInstance, InternalAxiosRequestConfig } from 'axios';

const STRAVA_API_URL = 'https://www.strava.com/api/v3';
const STRAVA_TOKEN_URL = 'https://www.strava.com/oauth/token';

export interface StravaCredentials {
  clientId: string;
  clientSecret: string;
  refreshToken: string;
}

export interface StravaAPIOptions extends StravaCredentials {
  /** Replaces the HTTP transport (tests). */
  adapter?: AxiosAdapter;
  maxRetries?: number;
}

interface StravaTokenResponse {
  access_token: string;
  expires_at: number;
  refresh_token: string;
}

export interface StravaCreateActivityInput {
  name: string;
  sport_type: string;
  start_date_local: string;
  elapsed_time: number;
  distance: number;
  description?: string;
  trainer?: 0 | 1;
  commute?: 0 | 1;
}

export interface StravaCreatedActivity {
  id: number;
  name: string;
}

export interface StravaUpload {
  id: number;
  external_id: string | null;
  error: string | null;
  status: string;
  activity_id: number | null;
}

export interface StravaUploadFileInput {
  name: string;
  externalId: string;
  description?: string;
}

type RetryableRequestConfig = InternalAxiosRequestConfig & { retryCount?: number };

export const formatStravaError = (error: unknown): string => {
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    if (status === 429) {
      return 'API_LIMIT_REACHED: Strava API limit reached. Please try again later.';
    }
    if (status === 401) {
      return 'AUTH_ERROR: Strava authorization failed. Please re-connect your account.';
    }
    if (status === 403) {
      return 'FORBIDDEN: Strava API access denied. Check app scopes and permissions.';
    }
    if (status && status >= 500) {
      return 'STRAVA_ERROR: Strava API is unavailable. Please try again later.';
    }
    const code = error.code;
    if (code === 'ECONNREFUSED' || code === 'ETIMEDOUT' || code === 'ENETUNREACH') {
      return 'NETWORK_ERROR: Unable to reach Strava API. Check network connectivity.';
    }
  }
  return error instanceof Error && error.message ? error.message : 'Unknown error';
};

export class StravaAPIService {
  private client: AxiosInstance;
  private authClient: AxiosInstance;
  private clientId: string;
  private clientSecret: string;
  private refreshToken: string;
  private accessToken: string = '';
  private tokenExpiresAt: number = 0;
  private readonly maxRetries: number;

  constructor(options: StravaAPIOptions) {
    this.clientId = options.clientId;
    this.clientSecret = options.clientSecret;
    this.refreshToken = options.refreshToken;
    this.maxRetries = options.maxRetries ?? 3;

    if (!this.clientId || !this.clientSecret || !this.refreshToken) {
      throw new Error('Missing Strava credentials. Please provide STRAVA_CLIENT_ID, STRAVA_CLIENT_SECRET, and STRAVA_REFRESH_TOKEN');
    }

    this.client = axios.create({
      baseURL: STRAVA_API_URL,
      headers: {
        'Accept': 'application/json',
      },
      adapter: options.adapter,
    });
    this.authClient = axios.create({ adapter: options.adapter });

    // Add request interceptor to handle authentication
    this.client.interceptors.request.use(async (config) => {
      await this.ensureValidToken();
      config.headers.Authorization = `Bearer ${this.accessToken}`;
      return config;
    });

    // Retry on rate limit (429) with backoff
    this.client.interceptors.response.use(
      (response) => response,
      async (error: unknown) => {
        if (!(error instanceof AxiosError) || error.response?.status !== 429 || !error.config) {
          return Promise.reject(error);
        }
        const config: RetryableRequestConfig = error.config;
        const retryCount = config.retryCount || 0;
        if (retryCount >= this.maxRetries) {
          return Promise.reject(error);
        }

        config.retryCount = retryCount + 1;
        const delayMs = this.getRetryDelayMs(error, retryCount);
        console.warn(`⏳ Strava rate limit hit (429). Waiting ${Math.round(delayMs / 1000)}s before retry ${config.retryCount}/${this.maxRetries}...`);
        await this.sleep(delayMs);
        return this.client(config);
      }
    );
  }

  private getRetryDelayMs(error: AxiosError, retryCount: number): number {
    const retryAfterHeader = error.response?.headers?.['retry-after'];
    if (typeof retryAfterHeader === 'string') {
      const retryAfterSeconds = parseInt(retryAfterHeader, 10);
      if (!Number.isNaN(retryAfterSeconds) && retryAfterSeconds > 0) {
        return retryAfterSeconds * 1000;
      }
    }

    return Math.min(15 * 60 * 1000, (retryCount + 1) * 60 * 1000);
  }

  /**
   * Ensure we have a valid access token (refresh if necessary)
   */
  private async ensureValidToken(): Promise<void> {
    const now = Math.floor(Date.now() / 1000);

    if (this.accessToken && this.tokenExpiresAt > now + 300) {
      // Token is still valid (with 5 minute buffer)
      return;
    }

    console.log('🔄 Refreshing Strava access token...');

    try {
      const response = await this.authClient.post<StravaTokenResponse>(STRAVA_TOKEN_URL, {
        client_id: this.clientId,
        client_secret: this.clientSecret,
        grant_type: 'refresh_token',
        refresh_token: this.refreshToken,
      });

      this.accessToken = response.data.access_token;
      this.tokenExpiresAt = response.data.expires_at;
      this.refreshToken = response.data.refresh_token; // Strava rotates refresh tokens

      console.log('✅ Access token refreshed successfully');
    } catch (error) {
      console.error('❌ Error refreshing access token:', formatStravaError(error));
      throw error;
    }
  }

  /**
   * Create a manual activity from summary values
   */
  async createActivity(input: StravaCreateActivityInput): Promise<StravaCreatedActivity> {
    try {
      const response = await this.client.post<StravaCreatedActivity>('/activities', input);
      return response.data;
    } catch (error) {
      console.error('❌ Error creating activity:', formatStravaError(error));
      throw error;
    }
  }

  /**
   * Upload a GPX track; Strava processes it asynchronously
   */
  async uploadFile(gpx: string, input: StravaUploadFileInput): Promise<StravaUpload> {
    const form = new FormData();
    form.append('file', new Blob([gpx], { type: 'application/gpx+xml' }), `${input.externalId}.gpx`);
    form.append('data_type', 'gpx');
    form.append('name', input.name);
    form.append('external_id', input.externalId);
    if (input.description) form.append('description', input.description);

    try {
      const response = await this.client.post<StravaUpload>('/uploads', form);
      return response.data;
    } catch (error) {
      console.error('❌ Error uploading file:', formatStravaError(error));
      throw error;
    }
  }

  /**
   * Poll the processing state of an upload
   */
  async getUpload(uploadId: number): Promise<StravaUpload> {
    try {
      const response = await this.client.get<StravaUpload>(`/uploads/${uploadId}`);
      return response.data;
    } catch (error) {
      console.error('❌ Error fetching upload status:', formatStravaError(error));
      throw error;
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
