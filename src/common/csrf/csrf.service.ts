import { Injectable } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { FormRequest, HtmlResponse } from '../http.types';

export const CSRF_COOKIE = 'csrf_token';
export const CSRF_FIELD = 'csrf_token';
export const CSRF_ERROR = 'The form has expired or is invalid. Please submit it again.';

/**
 * Double-submit form tokens. The token travels in a cookie signed with
 * SECRET_KEY (cookie-parser) and in a hidden form field; a post is accepted
 * only when both match.
 */
@Injectable()
export class CsrfService {
    issue(res: Pick<HtmlResponse, 'cookie'>): string {
        const token = uuidv4();
        res.cookie(CSRF_COOKIE, token, { httpOnly: true, sameSite: 'lax', signed: true });
        return token;
    }

    verify(req: FormRequest, submitted: unknown): boolean {
        const cookies: unknown = req.signedCookies;
        if (typeof cookies !== 'object' || cookies === null) {
            return false;
        }
        const expected: unknown = Reflect.get(cookies, CSRF_COOKIE);
        return typeof expected === 'string' && typeof submitted === 'string' && expected === submitted;
    }
}
