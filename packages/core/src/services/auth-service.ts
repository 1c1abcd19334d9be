/**
 * Authorization endpoints: the current user and the OAuth code exchange.
 */

import { OAUTH_AUTHORIZE_URL } from '../constants.js';
import { ValidationError } from '../client/errors.js';
import type { AuthorizedUserResponse, OAuthTokenRequest, OAuthTokenResponse } from '../types.js';
import { Service, labelled, query, requireId } from './service-helpers.js';

export class AuthService extends Service {
  async whoami(): Promise<AuthorizedUserResponse> {
    return labelled('get authorized user', () => this.api.get<AuthorizedUserResponse>('/v2/user'));
  }

  /**
   * Exchange an authorization code for an access token. The request goes out
   * without the stored key.
   */
  async token(request: OAuthTokenRequest): Promise<OAuthTokenResponse> {
    if (request.client_id.trim() === '' || request.client_secret.trim() === '' || request.code.trim() === '') {
      throw new ValidationError('client_id, client_secret, and code are required');
    }

    return labelled('exchange oauth token', () =>
      this.api.sendUnauthenticated<OAuthTokenResponse>('/v2/oauth/token', request)
    );
  }

  /**
   * Browser URL where a user grants the app access. No request is made.
   */
  authorizeUrl(clientId: string, redirectUri: string): string {
    const id = requireId(clientId, 'client ID');
    const redirect = requireId(redirectUri, 'redirect URI');
    return OAUTH_AUTHORIZE_URL + query({ client_id: id, redirect_uri: redirect });
  }
}
