// src/services/googleAuth.ts
import type { Credentials } from "google-auth-library";
import { google } from "googleapis";
import { AuthRequiredError, CalendarSubmissionError } from "../lib/errors";
import type { GoogleCredentials } from "../lib/session";

export const CALENDAR_SCOPES = ["https://www.googleapis.com/auth/calendar.events"];

export type AccessGrant = {
  accessToken: string;
  /** Same as the input unless a refresh happened */
  credentials: GoogleCredentials;
};

/** stored credentials -> valid access token, plus the consent round trip */
export interface GoogleAuth {
  buildAuthUrl(state: string): string;
  exchangeCode(code: string): Promise<GoogleCredentials>;
  getAccessToken(credentials: GoogleCredentials): Promise<AccessGrant>;
}

export function fromTokens(tokens: Credentials): GoogleCredentials {
  if (!tokens.access_token) throw new AuthRequiredError("Google did not return an access token");
  return {
    accessToken: tokens.access_token,
    refreshToken: tokens.refresh_token ?? undefined,
    expiryDate: tokens.expiry_date ?? undefined,
    scope: tokens.scope ?? undefined,
  };
}

export function toTokens(credentials: GoogleCredentials): Credentials {
  return {
    access_token: credentials.accessToken,
    refresh_token: credentials.refreshToken,
    expiry_date: credentials.expiryDate,
    scope: credentials.scope,
  };
}

export class GoogleAuthService implements GoogleAuth {
  constructor(
    private readonly params: { clientId: string; clientSecret: string; redirectUri: string }
  ) {}

  private client() {
    const { clientId, clientSecret, redirectUri } = this.params;
    return new google.auth.OAuth2(clientId, clientSecret, redirectUri);
  }

  buildAuthUrl(state: string): string {
    return this.client().generateAuthUrl({
      access_type: "offline",
      include_granted_scopes: true,
      prompt: "consent",
      scope: CALENDAR_SCOPES,
      state,
    });
  }

  async exchangeCode(code: string): Promise<GoogleCredentials> {
    const { tokens } = await this.client().getToken(code);
    return fromTokens(tokens);
  }

  async getAccessToken(credentials: GoogleCredentials): Promise<AccessGrant> {
    const client = this.client();
    client.setCredentials(toTokens(credentials));
    try {
      // Refreshes through the refresh token when the stored one has expired
      const { token } = await client.getAccessToken();
      if (!token) throw new CalendarSubmissionError("auth-expired", "Google session expired; sign in again");
      const refreshed = fromTokens(client.credentials);
      return {
        accessToken: token,
        credentials: { ...refreshed, refreshToken: refreshed.refreshToken ?? credentials.refreshToken },
      };
    } catch (err) {
      if (err instanceof CalendarSubmissionError) throw err;
      throw new CalendarSubmissionError("auth-expired", "Could not refresh Google credentials; sign in again", undefined, {
        cause: err,
      });
    }
  }
}
