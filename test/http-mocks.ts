import { FormRequest } from '../src/common/http.types';

export function createMockResponse() {
    const res = {
        status: jest.fn(),
        type: jest.fn(),
        send: jest.fn(),
        redirect: jest.fn(),
        cookie: jest.fn(),
    };
    res.status.mockReturnValue(res);
    res.type.mockReturnValue(res);
    res.send.mockReturnValue(res);
    res.cookie.mockReturnValue(res);
    return res;
}

export type MockResponse = ReturnType<typeof createMockResponse>;

/** The token the mock response last set as the form-token cookie. */
export function issuedToken(res: MockResponse): string {
    const calls = res.cookie.mock.calls;
    return String(calls[calls.length - 1][1]);
}

export function requestWithToken(token: string | undefined): FormRequest {
    return { signedCookies: token === undefined ? {} : { csrf_token: token } };
}

export function sentBody(res: MockResponse): string {
    const calls = res.send.mock.calls;
    return String(calls[calls.length - 1][0]);
}
