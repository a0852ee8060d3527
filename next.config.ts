import type { NextConfig } from 'next';

const nextConfig: NextConfig = {
  serverExternalPackages: ['unpdf'],
  async rewrites() {
    return [
      { source: '/upload', destination: '/api/upload' },
      { source: '/lsdir', destination: '/api/lsdir' },
      { source: '/download/:filename', destination: '/api/download/:filename' },
      { source: '/remove/:filename', destination: '/api/remove/:filename' },
      { source: '/convert/:filename', destination: '/api/convert/:filename' },
      { source: '/status/:filename', destination: '/api/status/:filename' },
      { source: '/cancel/:filename', destination: '/api/cancel/:filename' },
    ];
  },
};

export default nextConfig;
