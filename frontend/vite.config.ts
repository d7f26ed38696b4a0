import { defineConfig, loadEnv } from 'vite'
import react from '@vitejs/plugin-react'
import { fileURLToPath, URL } from 'node:url'

// https://vite.dev/config/
export default defineConfig(({ mode }) => {
  const env = loadEnv(mode, process.cwd())
  const region = env.VITE_BEDROCK_REGION || 'us-east-1'

  return {
    plugins: [react()],
    resolve: {
      alias: {
        '@': fileURLToPath(new URL('./src', import.meta.url)),
      },
    },
    build: {
      rollupOptions: {
        output: {
          manualChunks: {
            'vendor-react': ['react', 'react-dom', 'react-router-dom'],
            'vendor-antd': ['antd', '@ant-design/icons'],
            'vendor-utils': ['zustand', 'axios', 'zod', 'jszip', 'file-saver'],
          },
        },
      },
    },
    server: {
      port: 3000,
      // Set VITE_BEDROCK_ENDPOINT=/bedrock to route calls through this proxy
      proxy: {
        '/bedrock': {
          target: `https://bedrock-runtime.${region}.amazonaws.com`,
          changeOrigin: true,
          rewrite: (path) => path.replace(/^\/bedrock/, ''),
        },
      },
    },
  }
})
