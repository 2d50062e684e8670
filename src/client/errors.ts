import { t } from './i18n.js';

export interface ParsedApiError {
  message: string;
  details: string;
  code: string;
}

function stringField(record: object, ...keys: string[]): string {
  for (const key of keys) {
    const value: unknown = Reflect.get(record, key);
    if (typeof value === 'string' && value) {
      return value;
    }
  }
  return '';
}

/**
 * Pull message, details and code out of whatever the API or fetch threw
 */
export function parseApiError(error: unknown, lang = 'en'): ParsedApiError {
  let message = '';
  let details = '';
  let code = '';

  if (typeof error === 'string') {
    message = error;
  } else if (typeof error === 'object' && error !== null) {
    message = stringField(error, 'message', 'error', 'detail');
    code = stringField(error, 'code', 'error_code');

    const rawDetails: unknown = Reflect.get(error, 'details');
    details =
      typeof rawDetails === 'string'
        ? rawDetails
        : rawDetails == null
          ? stringField(error, 'error_details')
          : JSON.stringify(rawDetails);

    const nested: unknown = Reflect.get(error, 'error');
    if (typeof nested === 'object' && nested !== null) {
      message = stringField(nested, 'message') || JSON.stringify(nested);
    }
  }

  return { message: message || t('error.unknown', lang), details, code };
}

/**
 * User-facing text for a failed request, prefixed with the context when given
 */
export function describeError(error: unknown, lang = 'en', context = ''): ParsedApiError {
  const { message, details, code } = parseApiError(error, lang);
  const lower = message.toLowerCase();

  let translated = message;
  if (message.includes('401') || message.includes('Unauthorized') || message.includes('unauthenticated')) {
    translated = t('error.auth', lang);
  } else if (message.includes('API key') || message.includes('api_key') || message.includes('invalid_api_key')) {
    translated = t('error.api_key', lang) + (details ? `: ${details}` : '');
  } else if (lower.includes('elevenlabs')) {
    translated = `${t('error.elevenlabs', lang)}: ${message}`;
  } else if (lower.includes('openai')) {
    translated = `OpenAI: ${message}`;
  } else if (message.includes('network') || message.includes('fetch') || message.includes('ECONNREFUSED')) {
    translated = t('error.network', lang);
  } else if (message.includes('timeout') || message.includes('ETIMEDOUT')) {
    translated = t('error.timeout', lang);
  } else if (lower.includes('rate limit') || message.includes('429')) {
    translated = t('error.rate_limit', lang);
  }

  let text = (context ? `${context}: ` : '') + translated;
  if (code) {
    text += ` (${code})`;
  }
  return { message: text, details, code };
}
