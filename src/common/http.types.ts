import type { Request, Response } from 'express';

// The slices of express objects the HTML controllers touch
export type HtmlResponse = Pick<Response, 'status' | 'type' | 'send' | 'redirect' | 'cookie'>;
export type FormRequest = Pick<Request, 'signedCookies'>;
