/**
 * Frameo CLI
 * Command-line front end for the Frameo Control API
 */

import { parseArgs, type ParseArgsConfig } from "util";
import { readFile, writeFile } from "fs/promises";
import { FrameoClient, ApiError, type FetchFn } from "./client";
import { NEXT_PHOTO, PREVIOUS_PHOTO, basename } from "../device/commands";
import { errorMessage } from "../log";
import { VERSION } from "../version";

const COLORS = {
  reset: "\x1b[0m",
  green: "\x1b[32m",
  red: "\x1b[31m",
  blue: "\x1b[34m",
};

export const USAGE = `Frameo CLI - control a Frameo photo frame through the Frameo Control API

Usage:
  frameo [--host <host>] [--port <port>] <command> [args]

Commands:
  devices                                   List ADB devices on USB
  connect usb <serial>                      Connect over USB
  connect network <host> [--adb-port <n>]   Connect over TCP/IP
  disconnect                                Close the current connection
  state                                     Screen power, brightness, current app
  shell <command...>                        Run a shell command on the device
  tcpip [--adb-port <n>]                    Enable wireless debugging (USB only)
  wake | sleep                              Screen power
  brightness <level>                        Set brightness (0-255)
  tap <x> <y>                               Tap the screen
  swipe <x1> <y1> <x2> <y2> [--duration ms] Swipe gesture
  next | prev                               Next or previous photo
  home | back                               Home or back key
  open-app | restart-app                    Frameo app control
  screenshot [--output <file>]              Save a PNG screenshot
  upload <file> [--destination <path>]      Upload a photo
  download <remote> [--output <file>]       Download a file
  info                                      Model, Android version, resolution, battery
  health                                    Server health report

Options:
  --host <host>     API server host (default: localhost)
  --port <port>     API server port (default: 5000)
  -h, --help        Show this help
  --version         Show version`;

export interface CliOutput {
  log(line: string): void;
  error(line: string): void;
}

export interface CliDependencies {
  fetch?: FetchFn;
  out?: CliOutput;
  readFile?: (path: string) => Promise<Uint8Array>;
  writeFile?: (path: string, data: Uint8Array) => Promise<void>;
  color?: boolean;
}

/**
 * Bad command-line usage; reported without the "API Error" prefix
 */
class UsageError extends Error {}

interface CommandContext {
  client: FrameoClient;
  args: string[];
  flags: {
    adbPort?: string;
    duration?: string;
    output?: string;
    destination?: string;
  };
  print: Printer;
  readFile: (path: string) => Promise<Uint8Array>;
  writeFile: (path: string, data: Uint8Array) => Promise<void>;
}

interface Printer {
  ok(message: string): void;
  fail(message: string): void;
  info(message: string): void;
  line(message: string): void;
}

function createPrinter(out: CliOutput, color: boolean): Printer {
  const paint = (code: string, symbol: string) => (color ? `${code}${symbol}${COLORS.reset}` : symbol);
  return {
    ok: (message) => out.log(`${paint(COLORS.green, "✅")} ${message}`),
    fail: (message) => out.error(`${paint(COLORS.red, "❌")} ${message}`),
    info: (message) => out.log(`${paint(COLORS.blue, "ℹ️")} ${message}`),
    line: (message) => out.log(message),
  };
}

function parseInteger(name: string, value: string | undefined): number {
  if (value === undefined) {
    throw new UsageError(`Missing <${name}>`);
  }
  if (!/^-?\d+$/.test(value)) {
    throw new UsageError(`Invalid ${name}: ${value}`);
  }
  return parseInt(value, 10);
}

function requireArg(name: string, value: string | undefined): string {
  if (value === undefined || value === "") {
    throw new UsageError(`Missing <${name}>`);
  }
  return value;
}

function stringField(data: Record<string, unknown>, key: string, fallback = "Unknown"): string {
  const value = data[key];
  return typeof value === "string" || typeof value === "number" ? String(value) : fallback;
}

type Command = (ctx: CommandContext) => Promise<number>;

const COMMANDS: Record<string, Command> = {
  async devices({ client, print }) {
    const result = await client.get("/api/devices/usb");
    const devices = Array.isArray(result.devices) ? result.devices : [];
    if (devices.length === 0) {
      print.info("No USB devices found");
      return 0;
    }
    print.line("Available USB devices:");
    devices.forEach((device: unknown, i: number) => {
      if (typeof device !== "object" || device === null) return;
      const entry = Object.fromEntries(Object.entries(device));
      const marker = entry.isFrameo === true ? " [Frameo]" : "";
      print.line(
        `  ${i + 1}. ${stringField(entry, "serial")} (${stringField(entry, "vendorId")}:${stringField(entry, "productId")})${marker}`
      );
    });
    return 0;
  },

  async connect({ client, args, flags, print }) {
    const [type, target] = args;
    if (type === "usb") {
      const serial = requireArg("serial", target);
      await client.post("/api/connect", { type: "usb", serial });
      print.ok(`Connected to USB device: ${serial}`);
      return 0;
    }
    if (type === "network") {
      const host = requireArg("host", target);
      const body: Record<string, unknown> = { type: "network", host };
      if (flags.adbPort !== undefined) {
        body.port = parseInteger("adb-port", flags.adbPort);
      }
      const result = await client.post("/api/connect", body);
      print.ok(`Connected to network device: ${stringField(result, "endpoint", host)}`);
      return 0;
    }
    throw new UsageError("Usage: frameo connect usb <serial> | connect network <host> [--adb-port <n>]");
  },

  async disconnect({ client, print }) {
    await client.post("/api/disconnect");
    print.ok("Disconnected");
    return 0;
  },

  async state({ client, print }) {
    const result = await client.get("/api/state");
    const brightness = typeof result.brightness === "number" ? result.brightness : 0;
    print.line(`Device Status: ${result.isOn === true ? "ON" : "OFF"}`);
    print.line(`Brightness: ${brightness}/255 (${Math.floor((brightness / 255) * 100)}%)`);
    if (typeof result.currentApp === "string") {
      print.line(`Current App: ${result.currentApp}`);
    }
    return 0;
  },

  async shell({ client, args, print }) {
    const command = args.join(" ");
    requireArg("command", command);
    const result = await client.post("/api/shell", { command });
    const output = typeof result.output === "string" ? result.output : "";
    if (output.trim()) {
      print.line(output.replace(/\n$/, ""));
    } else {
      print.ok("Command executed");
    }
    return 0;
  },

  async tcpip({ client, flags, print }) {
    const body = flags.adbPort === undefined ? {} : { port: parseInteger("adb-port", flags.adbPort) };
    const result = await client.post("/api/tcpip", body);
    print.ok(`Wireless debugging enabled on port ${stringField(result, "port")}`);
    print.info("You can now connect wirelessly using the device's IP address");
    return 0;
  },

  async wake({ client, print }) {
    await client.post("/api/wake");
    print.ok("Device woken up");
    return 0;
  },

  async sleep({ client, print }) {
    await client.post("/api/sleep");
    print.ok("Device put to sleep");
    return 0;
  },

  async brightness({ client, args, print }) {
    const level = parseInteger("level", args[0]);
    await client.post("/api/brightness", { level });
    print.ok(`Brightness set to ${level}`);
    return 0;
  },

  async tap({ client, args, print }) {
    const x = parseInteger("x", args[0]);
    const y = parseInteger("y", args[1]);
    await client.post("/api/tap", { x, y });
    print.ok(`Tapped at (${x}, ${y})`);
    return 0;
  },

  async swipe({ client, args, flags, print }) {
    const x1 = parseInteger("x1", args[0]);
    const y1 = parseInteger("y1", args[1]);
    const x2 = parseInteger("x2", args[2]);
    const y2 = parseInteger("y2", args[3]);
    const duration = flags.duration === undefined ? 300 : parseInteger("duration", flags.duration);
    await client.post("/api/swipe", { x1, y1, x2, y2, duration });
    print.ok(`Swiped from (${x1}, ${y1}) to (${x2}, ${y2})`);
    return 0;
  },

  async next({ client, print }) {
    await client.post("/api/swipe", NEXT_PHOTO);
    print.ok("Next photo");
    return 0;
  },

  async prev({ client, print }) {
    await client.post("/api/swipe", PREVIOUS_PHOTO);
    print.ok("Previous photo");
    return 0;
  },

  async home({ client, print }) {
    await client.post("/api/keyevent", { key: "KEYCODE_HOME" });
    print.ok("Pressed home");
    return 0;
  },

  async back({ client, print }) {
    await client.post("/api/keyevent", { key: "KEYCODE_BACK" });
    print.ok("Pressed back");
    return 0;
  },

  async "open-app"({ client, print }) {
    await client.post("/api/app", { action: "open" });
    print.ok("Frameo app opened");
    return 0;
  },

  async "restart-app"({ client, print }) {
    await client.post("/api/app", { action: "restart" });
    print.ok("Frameo app restarted");
    return 0;
  },

  async screenshot({ client, flags, print, writeFile }) {
    const output = flags.output ?? "screenshot.png";
    const png = await client.bytes("GET", "/api/screenshot");
    await writeFile(output, png);
    print.ok(`Screenshot saved to ${output} (${png.byteLength} bytes)`);
    return 0;
  },

  async upload({ client, args, flags, print, readFile }) {
    const file = requireArg("file", args[0]);
    const data = await readFile(file);
    const query = new URLSearchParams({ filename: basename(file) });
    if (flags.destination !== undefined) {
      query.set("destination", flags.destination);
    }
    print.info(`Uploading ${file} (${data.byteLength} bytes)...`);
    const result = await client.upload(`/api/upload?${query.toString()}`, data);
    print.ok(`Uploaded to ${stringField(result, "remotePath")}`);
    return 0;
  },

  async download({ client, args, flags, print, writeFile }) {
    const remotePath = requireArg("remote", args[0]);
    const output = flags.output ?? basename(remotePath);
    print.info(`Downloading ${remotePath}...`);
    const data = await client.bytes("POST", "/api/download", { remotePath });
    await writeFile(output, data);
    print.ok(`Downloaded to ${output} (${data.byteLength} bytes)`);
    return 0;
  },

  async info({ client, print }) {
    const result = await client.get("/api/info");
    print.line(`Model: ${stringField(result, "model")}`);
    print.line(`Android Version: ${stringField(result, "androidVersion")}`);
    print.line(`Resolution: ${stringField(result, "resolution")}`);
    print.line(`Battery: ${typeof result.battery === "number" ? `${result.battery}%` : "Unknown"}`);
    return 0;
  },

  async health({ client, print }) {
    const report = await client.get("/api/health/report");
    print.line(`Status: ${stringField(report, "status")}`);

    const checks = report.checks;
    if (typeof checks === "object" && checks !== null) {
      for (const [name, check] of Object.entries(checks)) {
        if (typeof check !== "object" || check === null) continue;
        const entry = Object.fromEntries(Object.entries(check));
        const message = `${name}: ${stringField(entry, "message", "")}`;
        if (entry.ok === true) {
          print.ok(message);
        } else {
          print.fail(message);
        }
      }
    }

    if (Array.isArray(report.suggestions)) {
      for (const suggestion of report.suggestions) {
        if (typeof suggestion === "string") print.info(suggestion);
      }
    }
    return report.status === "unhealthy" ? 1 : 0;
  },
};

const CLI_OPTIONS = {
  host: { type: "string", default: "localhost" },
  port: { type: "string", default: "5000" },
  "adb-port": { type: "string" },
  duration: { type: "string" },
  output: { type: "string", short: "o" },
  destination: { type: "string", short: "d" },
  help: { type: "boolean", short: "h", default: false },
  version: { type: "boolean", default: false },
} satisfies ParseArgsConfig["options"];

function parseCliArgs(argv: string[]) {
  return parseArgs({ args: argv, allowPositionals: true, options: CLI_OPTIONS });
}

/**
 * Split argv after a leading `shell` command: its arguments go to the device verbatim
 */
function splitShellArgs(argv: string[]): { cliArgs: string[]; shellArgs: string[] | null } {
  const { tokens } = parseArgs({
    args: argv,
    allowPositionals: true,
    strict: false,
    tokens: true,
    options: CLI_OPTIONS,
  });
  for (const token of tokens) {
    if (token.kind !== "positional") continue;
    if (token.value !== "shell") break;
    const rest = argv.slice(token.index + 1);
    return {
      cliArgs: argv.slice(0, token.index + 1),
      shellArgs: rest[0] === "--" ? rest.slice(1) : rest,
    };
  }
  return { cliArgs: argv, shellArgs: null };
}

/**
 * Run the CLI; resolves to the process exit code
 */
export async function runCli(argv: string[], deps: CliDependencies = {}): Promise<number> {
  const out: CliOutput = deps.out ?? {
    log: (line) => console.log(line),
    error: (line) => console.error(line),
  };
  const print = createPrinter(out, deps.color ?? false);

  const { cliArgs, shellArgs } = splitShellArgs(argv);

  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(cliArgs);
  } catch (err) {
    print.fail(errorMessage(err));
    return 1;
  }

  const { values, positionals } = parsed;

  if (values.help) {
    print.line(USAGE);
    return 0;
  }
  if (values.version) {
    print.line(`frameo v${VERSION}`);
    return 0;
  }

  const [name, ...rest] = positionals;
  const args = shellArgs ?? rest;
  const command = name !== undefined && Object.hasOwn(COMMANDS, name) ? COMMANDS[name] : undefined;
  if (!command) {
    print.fail(name === undefined ? "No command given" : `Unknown command: ${name}`);
    print.line(USAGE);
    return 1;
  }

  try {
    const client = new FrameoClient({
      host: values.host,
      port: parseInteger("port", values.port),
      fetch: deps.fetch,
    });
    return await command({
      client,
      args,
      flags: {
        adbPort: values["adb-port"],
        duration: values.duration,
        output: values.output,
        destination: values.destination,
      },
      print,
      readFile: deps.readFile ?? ((path) => readFile(path)),
      writeFile: deps.writeFile ?? ((path, data) => writeFile(path, data)),
    });
  } catch (err) {
    if (err instanceof ApiError) {
      print.fail(`API Error: ${err.message}`);
    } else if (err instanceof UsageError) {
      print.fail(err.message);
    } else {
      print.fail(`Error: ${errorMessage(err)}`);
    }
    return 1;
  }
}
