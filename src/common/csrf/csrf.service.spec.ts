import { createMockResponse } from '../../../test/http-mocks';
import { CSRF_COOKIE, CsrfService } from './csrf.service';

describe('CsrfService', () => {
    const service = new CsrfService();

    it('issues a fresh token as a signed, http-only cookie', () => {
        const res = createMockResponse();

        const first = service.issue(res);
        const second = service.issue(res);

        expect(first).toMatch(/^[0-9a-f-]{36}$/);
        expect(second).not.toBe(first);
        expect(res.cookie).toHaveBeenCalledWith(CSRF_COOKIE, first, {
            httpOnly: true,
            sameSite: 'lax',
            signed: true,
        });
    });

    it('accepts a submitted token that matches the signed cookie', () => {
        expect(service.verify({ signedCookies: { csrf_token: 'abc' } }, 'abc')).toBe(true);
    });

    it('rejects mismatched, missing or tampered tokens', () => {
        expect(service.verify({ signedCookies: { csrf_token: 'abc' } }, 'abd')).toBe(false);
        expect(service.verify({ signedCookies: { csrf_token: 'abc' } }, undefined)).toBe(false);
        expect(service.verify({ signedCookies: {} }, 'abc')).toBe(false);
        // cookie-parser reports a bad signature as false
        expect(service.verify({ signedCookies: { csrf_token: false } }, 'false')).toBe(false);
    });
});
