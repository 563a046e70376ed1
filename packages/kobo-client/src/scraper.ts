/**
 * Sign-in page scraping
 *
 * The store has no API for password login, so the tokens it needs are read
 * out of the HTML of its sign-in pages.
 */

import { decodeHTML } from 'entities';
import type { LoginPageScraper, SignInForm } from './types.js';
import { ProtocolError } from './errors.js';

const WORKFLOW_ID_PATTERN = /\?workflowId=([^"]{36})/;
const VERIFICATION_TOKEN_PATTERN =
  /<input name="__RequestVerificationToken" type="hidden" value="([^"]+)" \/>/;
const AUTHENTICATED_URL_PATTERN = /'(kobo:\/\/UserAuthenticated\?[^']+)';/;

/**
 * Pattern-based scraper for the current sign-in page markup.
 */
export class PatternLoginPageScraper implements LoginPageScraper {
  parseSignInForm(html: string): SignInForm {
    const workflowMatch = WORKFLOW_ID_PATTERN.exec(html);
    if (!workflowMatch) {
      throw new ProtocolError(
        "Can't find the workflow ID in the login form. The page format might have changed."
      );
    }

    const tokenMatch = VERIFICATION_TOKEN_PATTERN.exec(html);
    if (!tokenMatch) {
      throw new ProtocolError(
        "Can't find the request verification token in the login form. The page format might have changed."
      );
    }

    return {
      workflowId: decodeHTML(workflowMatch[1]),
      requestVerificationToken: decodeHTML(tokenMatch[1]),
    };
  }

  parseAuthenticatedRedirect(html: string): string {
    const match = AUTHENTICATED_URL_PATTERN.exec(html);
    if (!match) {
      throw new ProtocolError(
        "Authenticated user URL can't be found. The page format might have changed."
      );
    }
    return match[1];
  }
}

/**
 * Read `userId` and `userKey` from the authenticated redirect URL.
 */
export function parseAuthenticatedUser(redirectUrl: string): { userId: string; userKey: string } {
  const query = redirectUrl.includes('?') ? redirectUrl.substring(redirectUrl.indexOf('?') + 1) : '';
  const params = new URLSearchParams(query);
  const userId = params.get('userId');
  const userKey = params.get('userKey');

  if (!userId || !userKey) {
    throw new ProtocolError(
      `Authenticated user URL is missing userId or userKey: '${redirectUrl}'.`
    );
  }

  return { userId, userKey };
}
