import { t } from './i18n.js';

/** m:ss; falsy input is 0:00 */
export function formatDuration(seconds: number | null | undefined): string {
  if (!seconds) {
    return '0:00';
  }
  const mins = Math.floor(seconds / 60);
  const secs = Math.floor(seconds % 60);
  return `${mins}:${secs.toString().padStart(2, '0')}`;
}

export function formatStatus(status: string, lang = 'en'): string {
  return t(`status.${status}`, lang, status);
}
