'use client';

import { useState, useRef } from 'react';
import { toast } from 'sonner';
import { Upload, FileText, Loader2, CheckCircle2, XCircle } from 'lucide-react';
import type { ApiMessage, ConversionJob } from '@/types';

interface UploadSectionProps {
  onConversionComplete?: () => void;
}

type UploadStatus = {
  type: 'success' | 'error' | 'info';
  message: string;
};

const POLL_INTERVAL_MS = 2000;
// Long documents can take a while: up to 30 minutes
const MAX_POLL_ATTEMPTS = 900;

export function UploadSection({ onConversionComplete }: UploadSectionProps) {
  const [file, setFile] = useState<File | null>(null);
  const [uploading, setUploading] = useState(false);
  const [uploadStatus, setUploadStatus] = useState<UploadStatus | null>(null);
  const [convertingTarget, setConvertingTarget] = useState<string | null>(null);
  const fileInputRef = useRef<HTMLInputElement>(null);

  const showStatus = (status: UploadStatus, resetAfterMs?: number) => {
    setUploadStatus(status);
    if (resetAfterMs) {
      setTimeout(() => setUploadStatus(null), resetAfterMs);
    }
  };

  const handleFileChange = (e: React.ChangeEvent<HTMLInputElement>) => {
    const selectedFile = e.target.files?.[0];
    if (selectedFile) {
      setFile(selectedFile);
      setUploadStatus(null);
    }
  };

  const handleUpload = async () => {
    if (!file) {
      toast.error('No file selected');
      return;
    }

    const formData = new FormData();
    formData.append('file', file);

    setUploading(true);
    setUploadStatus(null);

    try {
      toast.loading('Uploading file...', { id: 'upload' });

      const uploadResponse = await fetch('/api/upload', {
        method: 'POST',
        body: formData,
      });
      const uploadData: ApiMessage = await uploadResponse.json();

      if (!uploadResponse.ok) {
        throw new Error(uploadData.message || 'Upload failed');
      }

      toast.success('File uploaded', { id: 'upload' });

      const convertResponse = await fetch(`/api/convert/${encodeURIComponent(file.name)}`);
      const convertData: unknown = await convertResponse.json();

      if (!convertResponse.ok || typeof convertData !== 'string') {
        const message =
          typeof convertData === 'object' && convertData !== null && 'message' in convertData
            ? String(convertData.message)
            : 'Conversion could not be started';
        throw new Error(message);
      }

      showStatus({ type: 'info', message: 'Reading your document aloud...' });
      setConvertingTarget(convertData);
      pollConversionStatus(convertData);

      // Reset form
      setFile(null);
      if (fileInputRef.current) {
        fileInputRef.current.value = '';
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Upload failed';
      toast.error('Upload failed', { id: 'upload', description: message });
      showStatus({ type: 'error', message }, 5000);
    } finally {
      setUploading(false);
    }
  };

  const pollConversionStatus = (target: string) => {
    let attempts = 0;

    const finish = (status: UploadStatus) => {
      setConvertingTarget(null);
      showStatus(status, status.type === 'success' ? 3000 : 5000);
    };

    const poll = async () => {
      try {
        const response = await fetch(`/api/status/${encodeURIComponent(target)}`);
        if (!response.ok) {
          throw new Error('Failed to check status');
        }

        const job: ConversionJob & { message: string } = await response.json();

        if (job.status === 'completed') {
          toast.success('All set!', { description: `${target} is ready to download` });
          finish({ type: 'success', message: 'All set! Your audio is ready.' });
          onConversionComplete?.();
          return;
        }

        if (job.status === 'failed' || job.status === 'cancelled') {
          toast.error('Conversion failed', { description: job.message });
          finish({ type: 'error', message: job.message });
          return;
        }

        attempts++;
        if (job.state === 'synthesizing' && job.totalChunks > 0) {
          setUploadStatus({
            type: 'info',
            message: `Synthesizing speech... ${job.completedChunks}/${job.totalChunks}`,
          });
        } else if (job.state === 'merging') {
          setUploadStatus({ type: 'info', message: 'Almost there...' });
        }

        if (attempts < MAX_POLL_ATTEMPTS) {
          setTimeout(() => void poll(), POLL_INTERVAL_MS);
        } else {
          toast.info('Conversion is taking longer than expected', {
            description: 'The audio will appear in the list when ready.',
          });
          finish({ type: 'info', message: 'Conversion may still be in progress.' });
          onConversionComplete?.();
        }
      } catch {
        toast.error('Something went wrong', {
          description: 'Status check failed. Refresh the list to see if the audio is ready.',
        });
        finish({ type: 'error', message: 'Status check failed.' });
        onConversionComplete?.();
      }
    };

    void poll();
  };

  return (
    <div className="bg-white rounded-2xl shadow-md p-6 border border-[hsl(214.3,25%,88%)]">
      {/* Header */}
      <div className="flex items-center gap-2 mb-4">
        <div className="p-2 rounded-lg bg-[hsl(25,45%,82%)]">
          <Upload className="w-5 h-5 text-[hsl(214.3,25%,25%)]" />
        </div>
        <h3 className="text-xl font-bold text-[hsl(214.3,25%,25%)]">Upload Document</h3>
      </div>

      <p className="text-sm text-[hsl(214.3,20%,35%)] mb-6">
        Upload a PDF or text file to convert it to speech
      </p>

      {/* File Input */}
      <div className="space-y-4">
        <div className="border-2 border-dashed border-[hsl(214.3,25%,88%)] rounded-xl p-6 text-center hover:border-[hsl(214.3,28%,75%)] transition-colors cursor-pointer bg-[hsl(214.3,25%,97%)]">
          <input
            ref={fileInputRef}
            type="file"
            onChange={handleFileChange}
            accept=".pdf,.txt,.text"
            className="hidden"
            id="file-upload"
            disabled={uploading}
          />
          <label htmlFor="file-upload" className="cursor-pointer flex flex-col items-center">
            <FileText className="w-12 h-12 text-[hsl(25,45%,82%)] mb-3" />
            <p className="text-sm font-medium text-[hsl(214.3,25%,25%)] mb-1">
              {file ? file.name : 'Click to select a file'}
            </p>
            <p className="text-xs text-[hsl(214.3,15%,45%)]">PDF (.pdf), text (.txt)</p>
          </label>
        </div>

        {/* Upload Button with Status Messages */}
        <button
          onClick={() => void handleUpload()}
          disabled={!file || uploading || convertingTarget !== null}
          className={`w-full font-medium py-3 rounded-xl transition-all disabled:cursor-not-allowed flex items-center justify-center gap-2 shadow-md ${
            uploadStatus?.type === 'success'
              ? 'bg-[hsl(150,35%,82%)] text-[hsl(150,35%,25%)]'
              : uploadStatus?.type === 'error'
              ? 'bg-[hsl(0,45%,85%)] text-[hsl(0,45%,30%)]'
              : uploading || convertingTarget
              ? 'bg-[hsl(214.3,28%,75%)] text-[hsl(214.3,25%,25%)]'
              : 'bg-[hsl(25,45%,82%)] hover:bg-[hsl(25,50%,72%)] disabled:bg-[hsl(214.3,15%,60%)] text-[hsl(214.3,25%,25%)]'
          }`}
        >
          {uploading ? (
            <>
              <Loader2 className="w-5 h-5 animate-spin" />
              <span>Uploading...</span>
            </>
          ) : uploadStatus ? (
            <>
              {uploadStatus.type === 'success' ? (
                <CheckCircle2 className="w-5 h-5" />
              ) : uploadStatus.type === 'error' ? (
                <XCircle className="w-5 h-5" />
              ) : (
                <Loader2 className="w-5 h-5 animate-spin" />
              )}
              <span className="text-sm">{uploadStatus.message}</span>
            </>
          ) : (
            <>
              <Upload className="w-5 h-5" />
              <span>Upload and convert</span>
            </>
          )}
        </button>
      </div>
    </div>
  );
}
