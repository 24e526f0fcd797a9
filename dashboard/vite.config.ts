/**
 * Vite configuration for the voice client.
 *
 * - Uses @vitejs/plugin-react for JSX transform
 * - Proxies the voice WebSocket and status routes to the voice server during development
 * - Outputs production build to dashboard/dist/
 */

import { defineConfig } from "vite";
import react from "@vitejs/plugin-react";

// ============================================================================
// CONFIG
// ============================================================================

const VOICE_SERVER_TARGET = "http://localhost:8000";

export default defineConfig({
  plugins: [react()],
  server: {
    proxy: {
      "/ws": { target: VOICE_SERVER_TARGET, ws: true },
      "/health": VOICE_SERVER_TARGET,
    },
  },
  build: {
    outDir: "dist",
  },
});
