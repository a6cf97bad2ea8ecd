/**
 * Frameo Control Server - Entry Point
 * HTTP API for controlling a Frameo photo frame over ADB
 */

import { parseArgs } from "util";
import { config, printConfig } from "./config";
import { createLogger, errorMessage } from "./log";
import { FileCredentialStore } from "./adb/credential";
import { TangoTransport } from "./adb/tango";
import { getUsbManager } from "./adb/usb";
import { createDiscovery } from "./discovery";
import { SessionManager } from "./session/manager";
import { FrameoController } from "./device/controller";
import { HealthChecker } from "./health/checker";
import { FrameoServer } from "./server/http";

const log = createLogger("main");

// Parse CLI arguments (override ENV defaults)
const { values } = parseArgs({
  args: process.argv.slice(2),
  options: {
    port: { type: "string", short: "p", default: String(config.HTTP_PORT) },
    host: { type: "string", default: config.HOST },
    key: { type: "string", short: "k", default: config.ADB_KEY_PATH },
    config: { type: "boolean", default: false },
    help: { type: "boolean", default: false },
  },
});

// Help
if (values.help) {
  console.log(`
Frameo Control Server

Usage:
  npx tsx src/index.ts [options]

Options:
  -p, --port <port>    HTTP server port (default: ${config.HTTP_PORT})
  --host <addr>        Bind address (default: ${config.HOST})
  -k, --key <path>     ADB private key file (default: ${config.ADB_KEY_PATH})
  --config             Print configuration and exit
  --help               Show this help

Environment Variables (overridden by CLI args):
  FRAMEO_HTTP_PORT     HTTP server port (default: 5000)
  FRAMEO_HOST          Bind address (default: 0.0.0.0)
  FRAMEO_ADB_KEY_PATH  ADB private key file (default: ~/.frameo/adbkey)
  FRAMEO_ADB_PORT      Default ADB TCP port (default: 5555)
  FRAMEO_UPLOAD_DIR    Upload directory on the frame (default: /sdcard/Frameo)
  FRAMEO_APP_PACKAGE   Frameo app package (default: com.frameo.app)
  FRAMEO_VENDOR_IDS    USB vendor ids treated as frames (default: 2207,18d1)
  FRAMEO_LOG_LEVEL     Log level: debug, info, warn, error (default: info)

Examples:
  npx tsx src/index.ts                        # HTTP:5000
  npx tsx src/index.ts -p 8080                # HTTP:8080
  FRAMEO_LOG_LEVEL=debug npx tsx src/index.ts # Verbose
`);
  process.exit(0);
}

if (values.config) {
  printConfig();
  process.exit(0);
}

const httpPort = parseInt(values.port, 10);
if (isNaN(httpPort)) {
  console.error(`Invalid port: ${values.port}`);
  process.exit(1);
}

// Create components
const credentials = new FileCredentialStore(values.key);
const usbManager = getUsbManager();
const discovery = createDiscovery(config.VENDOR_IDS);

const sessions = new SessionManager({
  transport: new TangoTransport({ credentialStore: credentials, usbManager }),
  defaultPort: config.ADB_PORT,
  onChange: (status) => server.broadcastSession(status),
});

const controller = new FrameoController(sessions, {
  appPackage: config.APP_PACKAGE,
  uploadDir: config.UPLOAD_DIR,
});

const checker = new HealthChecker({
  discovery,
  keyUsable: () => credentials.isUsable(),
  keyPath: credentials.keyPath,
  session: () => sessions.status(),
});

const server = new FrameoServer({
  port: httpPort,
  host: values.host,
  sessions,
  controller,
  discovery,
  checker,
});

await server.start();

console.log(`
Frameo Control Server started!

  HTTP:      http://localhost:${httpPort}
  Events:    ws://localhost:${httpPort}/events
  ADB key:   ${values.key}

API:
  GET  /api/devices/usb  - ADB devices on USB
  POST /api/connect      - Connect {"type":"usb","serial":"..."} or {"type":"network","host":"..."}
  POST /api/disconnect   - Close the connection
  GET  /api/state        - Screen power and brightness
  POST /api/shell        - Run a command {"command":"..."}
  POST /api/tcpip        - Enable wireless debugging (USB only)
  GET  /api/health       - Session status

Press Ctrl+C to stop.
`);

// Graceful shutdown
async function shutdown(): Promise<void> {
  console.log("\nShutting down...");
  try {
    await sessions.disconnect();
  } catch (err) {
    log.warn(`Disconnect on shutdown failed: ${errorMessage(err)}`);
  }
  await server.stop();
  process.exit(0);
}

const onSignal = () => {
  shutdown().catch((err) => {
    log.error(`Shutdown failed: ${errorMessage(err)}`);
    process.exit(1);
  });
};

process.on("SIGINT", onSignal);
process.on("SIGTERM", onSignal);
