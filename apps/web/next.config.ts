import type { NextConfig } from 'next';

const nextConfig: NextConfig = {
  // Workspace packages ship TypeScript sources
  transpilePackages: ['@payhub/database', '@payhub/shared'],
};

export default nextConfig;
