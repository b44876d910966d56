const SIZE_UNITS = ['Bytes', 'KB', 'MB', 'GB'];

export const PREVIEW_LINE_LIMIT = 5;

const TEXT_MIME_TYPES = new Set([
  'text/plain',
  'text/html',
  'text/css',
  'text/javascript',
  'application/json',
  'application/xml',
  'application/javascript',
  'application/typescript',
]);

const TEXT_EXTENSIONS = new Set([
  '.txt', '.js', '.py', '.html', '.css', '.json', '.xml', '.md', '.csv', '.ts',
  '.jsx', '.tsx', '.java', '.c', '.cpp', '.h', '.cs', '.php', '.rb', '.go',
  '.rs', '.swift', '.kt', '.sh', '.bat', '.ps1', '.yml', '.yaml',
]);

export function formatFileSize(bytes: number): string {
  if (bytes === 0) return '0 Bytes';
  const i = Math.min(SIZE_UNITS.length - 1, Math.floor(Math.log(bytes) / Math.log(1024)));
  return `${parseFloat((bytes / 1024 ** i).toFixed(2))} ${SIZE_UNITS[i] ?? 'Bytes'}`;
}

export function fileExtension(name: string): string {
  const dot = name.lastIndexOf('.');
  return dot === -1 ? '' : name.slice(dot).toLowerCase();
}

export function isImageFile(file: Pick<File, 'type'>): boolean {
  return file.type.startsWith('image/');
}

export function isTextFile(file: Pick<File, 'name' | 'type'>): boolean {
  return TEXT_MIME_TYPES.has(file.type) || TEXT_EXTENSIONS.has(fileExtension(file.name));
}

/** First lines of `text`, with "\n..." appended when lines were cut. */
export function buildTextPreview(text: string, maxLines = PREVIEW_LINE_LIMIT): string {
  const lines = text.split('\n');
  if (lines.length <= maxLines) return text;
  return `${lines.slice(0, maxLines).join('\n')}\n...`;
}

function readFile(file: Blob, mode: 'text' | 'dataUrl'): Promise<string> {
  return new Promise((resolve, reject) => {
    const reader = new FileReader();
    reader.onload = () => {
      resolve(typeof reader.result === 'string' ? reader.result : '');
    };
    reader.onerror = () => {
      reject(reader.error ?? new Error('File read failed'));
    };
    if (mode === 'text') reader.readAsText(file);
    else reader.readAsDataURL(file);
  });
}

export function readFileAsText(file: Blob): Promise<string> {
  return readFile(file, 'text');
}

export function readFileAsDataUrl(file: Blob): Promise<string> {
  return readFile(file, 'dataUrl');
}
