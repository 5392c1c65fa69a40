import type { LoggerService } from '@nestjs/common';
import type { AppConfigService } from './config.service';

/**
 * Flags the development fallback secret. Outside development and test the
 * fallback leaves signed cookies forgeable, so it is reported as an error.
 */
export function reportSecretKeyUsage(
    config: Pick<AppConfigService, 'usesDevelopmentSecret' | 'isDevelopment' | 'isTest' | 'nodeEnv'>,
    logger: Pick<LoggerService, 'warn' | 'error'>,
): 'ok' | 'development-fallback' | 'insecure-fallback' {
    if (!config.usesDevelopmentSecret) {
        return 'ok';
    }

    if (config.isDevelopment || config.isTest) {
        logger.warn('SECRET_KEY is not set; using the development fallback key.');
        return 'development-fallback';
    }

    logger.error(
        `SECRET_KEY is not set while NODE_ENV=${config.nodeEnv}; the development fallback key is not secure.`,
    );
    return 'insecure-fallback';
}
