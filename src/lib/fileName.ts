import sanitize from 'sanitize-filename';

export const DEFAULT_DOWNLOAD_FILE_NAME = 'download';

export function safeBaseName(name: string): string {
  const cleaned = sanitize(name).trim();
  return cleaned || DEFAULT_DOWNLOAD_FILE_NAME;
}

export function csvFileName(name = DEFAULT_DOWNLOAD_FILE_NAME): string {
  return `${safeBaseName(name)}.csv`;
}
