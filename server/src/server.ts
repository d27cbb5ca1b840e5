// ============================================================
// Vision Analyzer - Server Startup
// ============================================================

import { VisionAnalyzer } from '../../src/analyzer';
import { createApp } from './app';
import { loadServerConfig } from './config';

export function startServer(config = loadServerConfig()): void {
  const analyzer = new VisionAnalyzer();
  const app = createApp({ analyzer, uploadDir: config.uploadDir, maxFileSize: config.maxFileSize });

  app.listen(config.port, () => {
    console.log(`\n  Vision Analyzer running at http://localhost:${config.port}`);
    const available = analyzer.dispatcher.availableProviders();
    console.log(`  Configured providers: ${available.length > 0 ? available.join(', ') : 'none'}`);
    console.log('  Set OPENAI_API_KEY, ANTHROPIC_API_KEY or GOOGLE_API_KEY to enable more.\n');
  });
}
