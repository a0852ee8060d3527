'use client';

import { useState } from 'react';
import { AudioLines } from 'lucide-react';
import { UploadSection } from '@/components/UploadSection';
import { ConvertedFiles } from '@/components/ConvertedFiles';

export default function HomePage() {
  const [refreshTrigger, setRefreshTrigger] = useState(0);

  const handleConversionComplete = () => {
    // Trigger converted file list refresh
    setRefreshTrigger((prev) => prev + 1);
  };

  return (
    <div className="min-h-screen bg-[hsl(214.3,31.8%,91.4%)]">
      <div className="container mx-auto px-3 sm:px-4 py-6 sm:py-8 max-w-6xl">
        {/* Header */}
        <header className="mb-6 sm:mb-8">
          <div className="flex items-center gap-3 bg-white rounded-2xl px-3 sm:px-6 py-3 sm:py-4 shadow-md border border-[hsl(214.3,25%,88%)]">
            <div className="w-8 h-8 sm:w-10 sm:h-10 rounded-full bg-[hsl(214.3,28%,75%)] flex items-center justify-center shrink-0">
              <AudioLines className="w-4 h-4 sm:w-5 sm:h-5 text-[hsl(214.3,25%,25%)]" />
            </div>
            <div className="min-w-0">
              <h1 className="text-lg sm:text-2xl font-bold text-[hsl(214.3,25%,25%)]">speakdoc</h1>
              <p className="text-xs sm:text-sm text-[hsl(214.3,20%,35%)] hidden sm:block">
                Turn documents into audio
              </p>
            </div>
          </div>
        </header>

        <div className="grid grid-cols-1 lg:grid-cols-3 gap-6">
          <div className="lg:col-span-1">
            <UploadSection onConversionComplete={handleConversionComplete} />
          </div>
          <div className="lg:col-span-2">
            <ConvertedFiles refreshTrigger={refreshTrigger} />
          </div>
        </div>
      </div>
    </div>
  );
}
