import { createApp } from './app.js';
import { loadConfig } from './config.js';

const config = loadConfig();
const app = createApp(config);

// Start server
const server = app.listen(config.port, () => {
  console.log(`
╔════════════════════════════════════════════════════════════╗
║                   Hold'em Equity API                       ║
║                                                            ║
║   Listening at: http://localhost:${String(config.port).padEnd(26)}║
║                                                            ║
║   Press Ctrl+C to stop the server                          ║
╚════════════════════════════════════════════════════════════╝
`);
  console.log(`Default trials: ${config.defaultTrials}, max per request: ${config.maxTrials}`);
});

function shutdown(): void {
  console.log('\nShutting down...');
  server.close(() => {
    console.log('Server stopped.');
    process.exit(0);
  });
}

// Graceful shutdown
process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
