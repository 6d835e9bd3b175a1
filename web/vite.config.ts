import tailwindcss from "@tailwindcss/vite";
import react from "@vitejs/plugin-react";
import path from "path";
import { fileURLToPath } from "url";
import { defineConfig, loadEnv } from "vite";
import { ENV_PREFIX, resolveServerConfig } from "./server/config";
import { songDatasetPlugin } from "./server/datasetPlugin";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
const repoRoot = path.resolve(__dirname, "..");

export default defineConfig(({ mode }) => {
	const env = loadEnv(mode, repoRoot, ENV_PREFIX);
	const serverConfig = resolveServerConfig(env, repoRoot);

	return {
		root: __dirname,
		base: "/",
		envDir: repoRoot,
		plugins: [react(), tailwindcss(), songDatasetPlugin(serverConfig)],
		server: {
			port: 5173,
			open: false,
		},
		preview: {
			port: 4173,
		},
		build: {
			outDir: path.resolve(repoRoot, "dist", "web"),
			emptyOutDir: true,
		},
	};
});
