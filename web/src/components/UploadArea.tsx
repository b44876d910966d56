import { useEffect, useState, type DragEvent } from 'react';

import {
  buildTextPreview,
  formatFileSize,
  isImageFile,
  isTextFile,
  readFileAsDataUrl,
  readFileAsText,
} from '../utils/files.js';

type PreviewState =
  | { kind: 'none' }
  | { kind: 'image'; url: string }
  | { kind: 'text'; text: string }
  | { kind: 'error'; message: string };

export type UploadAreaProps = {
  name: string;
  label: string;
  hint: string;
  accept?: string;
  file: File | null;
  onFileChange: (file: File) => void;
};

export function UploadArea({ name, label, hint, accept, file, onFileChange }: UploadAreaProps) {
  const [dragActive, setDragActive] = useState(false);
  const [preview, setPreview] = useState<PreviewState>({ kind: 'none' });

  useEffect(() => {
    setPreview({ kind: 'none' });
    if (!file) return;
    let cancelled = false;
    void (async () => {
      try {
        if (isImageFile(file)) {
          const url = await readFileAsDataUrl(file);
          if (!cancelled) setPreview({ kind: 'image', url });
        } else if (isTextFile(file)) {
          const text = await readFileAsText(file);
          if (!cancelled) setPreview({ kind: 'text', text: buildTextPreview(text) });
        }
      } catch (e) {
        const message = e instanceof Error ? e.message : String(e);
        if (!cancelled) setPreview({ kind: 'error', message });
      }
    })();
    return () => {
      cancelled = true;
    };
  }, [file]);

  function onDragOver(e: DragEvent<HTMLLabelElement>) {
    e.preventDefault();
    setDragActive(true);
  }

  function onDragLeave(e: DragEvent<HTMLLabelElement>) {
    e.preventDefault();
    setDragActive(false);
  }

  function onDrop(e: DragEvent<HTMLLabelElement>) {
    e.preventDefault();
    setDragActive(false);
    const dropped = e.dataTransfer.files[0];
    if (dropped) onFileChange(dropped);
  }

  return (
    <label
      className={dragActive ? 'upload-area active' : 'upload-area'}
      onDragOver={onDragOver}
      onDragLeave={onDragLeave}
      onDrop={onDrop}
    >
      <input
        className="file-input"
        type="file"
        name={name}
        accept={accept}
        aria-label={label}
        onChange={(e) => {
          const next = e.target.files?.[0];
          if (next) onFileChange(next);
        }}
      />
      <div className="upload-label">{label}</div>
      <div className="upload-text">{file ? 'Click to change file' : hint}</div>
      {file && (
        <div className="file-preview">
          {preview.kind === 'image' && <img className="image-preview" src={preview.url} alt={file.name} />}
          <div className="file-info">{`${file.name} (${formatFileSize(file.size)})`}</div>
          {preview.kind === 'text' && <pre className="code-preview">{preview.text}</pre>}
          {preview.kind === 'error' && <div className="status">Preview unavailable: {preview.message}</div>}
        </div>
      )}
    </label>
  );
}
