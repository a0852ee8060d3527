'use client';

import { useState, useEffect, useCallback } from 'react';
import { toast } from 'sonner';
import { FileAudio, Download, Trash2, Loader2, RefreshCw, Library } from 'lucide-react';
import type { ConvertedFileEntry } from '@/types';

interface ConvertedFilesProps {
  refreshTrigger?: number;
}

export function ConvertedFiles({ refreshTrigger }: ConvertedFilesProps) {
  const [files, setFiles] = useState<ConvertedFileEntry[]>([]);
  const [loading, setLoading] = useState(true);
  const [removing, setRemoving] = useState<string | null>(null);

  const loadFiles = useCallback(async () => {
    try {
      setLoading(true);

      const response = await fetch('/api/lsdir');

      if (!response.ok) {
        throw new Error('Failed to load converted files');
      }

      const data: ConvertedFileEntry[] = await response.json();
      setFiles(data);
    } catch (error) {
      toast.error('Failed to load converted files', {
        description: error instanceof Error ? error.message : 'Unknown error',
      });
    } finally {
      setLoading(false);
    }
  }, []);

  useEffect(() => {
    void loadFiles();
  }, [loadFiles]);

  // Refresh when a conversion finishes
  useEffect(() => {
    if (refreshTrigger !== undefined && refreshTrigger > 0) {
      void loadFiles();
    }
  }, [refreshTrigger, loadFiles]);

  const handleRemove = (file: string) => {
    toast(`Remove "${file}"?`, {
      description: 'The audio file will be deleted and cannot be recovered.',
      action: {
        label: 'Remove',
        onClick: () => void performRemove(file),
      },
      cancel: {
        label: 'Cancel',
        onClick: () => {},
      },
      duration: 10000,
    });
  };

  const performRemove = async (file: string) => {
    try {
      setRemoving(file);
      toast.loading('Removing file...', { id: `remove-${file}` });

      const response = await fetch(`/api/remove/${encodeURIComponent(file)}`);
      const data = await response.json();

      if (!response.ok) {
        throw new Error(data.message || 'Remove failed');
      }

      toast.success('File removed', { id: `remove-${file}` });
      setFiles((prev) => prev.filter((entry) => entry.file !== file));
    } catch (error) {
      toast.error('Failed to remove file', {
        id: `remove-${file}`,
        description: error instanceof Error ? error.message : 'Unknown error',
      });
    } finally {
      setRemoving(null);
    }
  };

  if (loading) {
    return (
      <div className="bg-white rounded-2xl shadow-md p-6 border border-[hsl(214.3,25%,88%)]">
        <div className="flex items-center justify-center py-12">
          <div className="text-center">
            <Loader2 className="w-8 h-8 animate-spin text-[hsl(214.3,28%,75%)] mx-auto mb-2" />
            <p className="text-[hsl(214.3,20%,35%)]">Loading audio files...</p>
          </div>
        </div>
      </div>
    );
  }

  return (
    <div className="bg-white rounded-2xl shadow-md p-4 sm:p-6 border border-[hsl(214.3,25%,88%)] overflow-hidden">
      {/* Header */}
      <div className="flex justify-between items-center mb-4 sm:mb-6 gap-2 sm:gap-4">
        <div className="flex items-center gap-2 min-w-0 flex-1">
          <div className="p-2 rounded-lg bg-[hsl(25,45%,82%)] shrink-0">
            <Library className="w-4 h-4 sm:w-5 sm:h-5 text-[hsl(214.3,25%,25%)]" />
          </div>
          <div className="min-w-0 flex-1">
            <h2 className="text-lg sm:text-xl font-bold text-[hsl(214.3,25%,25%)] truncate">
              Converted Audio
            </h2>
            <p className="text-xs text-[hsl(214.3,15%,45%)]">
              {files.length} {files.length === 1 ? 'file' : 'files'}
            </p>
          </div>
        </div>
        <button
          onClick={() => void loadFiles()}
          className="flex items-center gap-1 sm:gap-2 px-2 sm:px-3 py-2 text-xs sm:text-sm font-medium text-[hsl(214.3,20%,35%)] hover:text-[hsl(214.3,25%,25%)] rounded-lg hover:bg-[hsl(214.3,25%,94%)] transition-colors shrink-0"
        >
          <RefreshCw className="w-3 h-3 sm:w-4 sm:h-4" />
          <span className="hidden sm:inline">Refresh</span>
        </button>
      </div>

      {files.length === 0 ? (
        <div className="text-center py-12">
          <div className="w-16 h-16 rounded-full bg-[hsl(214.3,25%,94%)] flex items-center justify-center mx-auto mb-4">
            <Library className="w-8 h-8 text-[hsl(214.3,28%,75%)]" />
          </div>
          <p className="text-lg font-medium text-[hsl(214.3,25%,25%)] mb-2">No audio yet</p>
          <p className="text-sm text-[hsl(214.3,15%,45%)]">
            Upload a document to hear it read aloud.
          </p>
        </div>
      ) : (
        <div className="grid gap-3 sm:gap-4">
          {files.map((entry) => (
            <div
              key={entry.file}
              className="p-3 sm:p-4 rounded-xl border border-[hsl(15,35%,85%)] bg-[hsl(15,35%,95%)] hover:shadow-lg transition-all"
            >
              <div className="flex items-center justify-between gap-2 sm:gap-4">
                <div className="flex items-center gap-2 sm:gap-3 flex-1 min-w-0">
                  <div className="p-1.5 sm:p-2 rounded-lg bg-[hsl(15,40%,75%)] shrink-0">
                    <FileAudio className="w-4 h-4 sm:w-5 sm:h-5 text-[hsl(214.3,25%,25%)]" />
                  </div>
                  <div className="min-w-0">
                    <h3 className="font-semibold text-sm sm:text-base text-[hsl(214.3,25%,25%)] truncate">
                      {entry.file}
                    </h3>
                    <p className="text-xs text-[hsl(214.3,15%,45%)]">{entry.size}</p>
                  </div>
                </div>

                <a
                  href={`/api/download/${encodeURIComponent(entry.file)}`}
                  className="shrink-0 p-1.5 sm:p-2 text-[hsl(214.3,25%,35%)] hover:bg-[hsl(214.3,25%,90%)] rounded-lg transition-colors"
                  title="Download"
                >
                  <Download className="w-4 h-4 sm:w-5 sm:h-5" />
                </a>
                <button
                  onClick={() => handleRemove(entry.file)}
                  disabled={removing === entry.file}
                  className="shrink-0 p-1.5 sm:p-2 text-[hsl(0,45%,50%)] hover:bg-[hsl(0,45%,95%)] rounded-lg transition-colors disabled:opacity-50 disabled:cursor-not-allowed"
                  title="Remove file"
                >
                  {removing === entry.file ? (
                    <Loader2 className="w-4 h-4 sm:w-5 sm:h-5 animate-spin" />
                  ) : (
                    <Trash2 className="w-4 h-4 sm:w-5 sm:h-5" />
                  )}
                </button>
              </div>
            </div>
          ))}
        </div>
      )}
    </div>
  );
}
