import axios, { AxiosInstance } from "axios";
import { StravaConfig } from "./config";
import { StravaActivity, TimeWindow, TokenResponse } from "./types";

const HTTP_STATUS_OK = 200;

/**
 * Shared Strava client: token exchange and raw activity pages
 */
export class StravaClient {
  private config: StravaConfig;
  private http: AxiosInstance;

  constructor(config: StravaConfig) {
    this.config = config;
    this.http = axios.create({
      timeout: config.timeoutMs,
      adapter: config.adapter,
      headers: {
        "Accept": "application/json",
      },
    });
  }

  /**
   * Exchange the long-lived refresh token for a short-lived access token
   */
  async getAccessToken(): Promise<string> {
    console.log("🔐 Fetching new access token from Strava...");

    const response = await this.http.post<TokenResponse | string>(
      this.config.tokenUrl,
      new URLSearchParams({
        client_id: this.config.clientId,
        client_secret: this.config.clientSecret,
        refresh_token: this.config.refreshToken,
        grant_type: "refresh_token",
      }),
      { validateStatus: () => true }
    );

    if (response.status !== HTTP_STATUS_OK) {
      const body =
        typeof response.data === "string" ? response.data : JSON.stringify(response.data);
      console.error(`❌ Error fetching access token: ${body}`);
      throw new Error(`Strava token exchange failed with status ${response.status}`);
    }

    const data = response.data;
    if (typeof data === "string" || typeof data?.access_token !== "string") {
      throw new Error("Strava token response did not contain an access_token");
    }

    return data.access_token;
  }

  /**
   * Fetch one page of the authenticated athlete's activities.
   * Non-2xx statuses reject with an AxiosError.
   */
  async getActivitiesPage(
    accessToken: string,
    window: TimeWindow,
    page: number
  ): Promise<StravaActivity[]> {
    const response = await this.http.get<unknown>(`${this.config.apiUrl}/athlete/activities`, {
      headers: { Authorization: `Bearer ${accessToken}` },
      params: {
        after: window.after,
        before: window.before,
        page,
        per_page: this.config.perPage,
      },
    });

    if (!Array.isArray(response.data)) {
      throw new Error(
        `Unexpected activities response on page ${page}: expected an array, got ${typeof response.data}`
      );
    }

    return response.data;
  }

  get perPage(): number {
    return this.config.perPage;
  }
}

export default StravaClient;
