import React from 'react';
import { downloadDataCsv } from '../lib/tableRegistry';

function downloadIcon() {
  return (
    <svg
      width={16}
      height={16}
      viewBox="0 0 24 24"
      fill="none"
      stroke="currentColor"
      strokeWidth={2}
      strokeLinecap="round"
      strokeLinejoin="round"
      aria-hidden="true"
    >
      <path d="M12 3v12" />
      <path d="M7 10l5 5 5-5" />
      <path d="M5 21h14" />
    </svg>
  );
}

export function DownloadCsvButton({ elementId, fileName }: { elementId: string; fileName: string }) {
  return (
    <button
      type="button"
      className="btn"
      onClick={() => {
        downloadDataCsv(elementId, fileName);
      }}
    >
      {downloadIcon()} Download as CSV
    </button>
  );
}
