import type { NextConfig } from "next";

const nextConfig: NextConfig = {
  typescript: {
    tsconfigPath: "./tsconfig.json",
  },
  // Native module; loaded at runtime rather than bundled
  serverExternalPackages: ["better-sqlite3"],
};

export default nextConfig;
