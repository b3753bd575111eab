import { basename, dirname, extname, join } from "node:path";
import { Command, CommanderError, InvalidArgumentError, Option } from "commander";
import { SealedPage } from "../api/SealedPage";
import { SP_CONSTANTS } from "../constants";
import { inferInputKind } from "../document/input";
import { SealedPageError, ValidationError, WeakPasswordError, describeError } from "../errors";
import { createLogger, parseLogLevel, type Logger } from "../logging/logger";
import { isSupportedVersion } from "../payload/FormatRegistry";
import { FileService } from "../storage/FileService";
import type { FormatVersion } from "../types";

export interface CliIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  env: NodeJS.ProcessEnv;
  /** Builds the logger once `--log-level` is known. */
  logger?: (level: string) => Logger;
}

interface CommonOptions {
  input: string;
  output?: string;
  password?: string;
}

interface ProtectCliOptions extends CommonOptions {
  style?: string;
  title?: string;
  allowUnsafePassword?: boolean;
  minify: boolean;
  formatVersion?: FormatVersion;
}

interface ConvertCliOptions {
  input: string;
  output?: string;
  style?: string;
  minify: boolean;
}

interface EncryptCliOptions extends CommonOptions {
  allowUnsafePassword?: boolean;
  formatVersion?: FormatVersion;
}

type GlobalOptions = {
  logLevel?: string;
};

const VERSION = "1.0.0";

function parseFormatVersion(value: string): FormatVersion {
  const n = Number(value);
  if (!isSupportedVersion(n)) {
    throw new InvalidArgumentError(`expected one of ${SP_CONSTANTS.SUPPORTED_VERSIONS.join(", ")}`);
  }
  return n;
}

/** `<dir of input>/<stem><suffix>` */
export function siblingPath(input: string, suffix: string): string {
  const stem = basename(input, extname(input));
  return join(dirname(input), `${stem}${suffix}`);
}

class CliContext {
  private cached: { logger: Logger; files: FileService; sp: SealedPage } | null = null;

  constructor(private readonly io: CliIo, private readonly program: Command) {}

  get services(): { logger: Logger; files: FileService; sp: SealedPage } {
    if (!this.cached) {
      const globals = this.program.opts<GlobalOptions>();
      const level = parseLogLevel(globals.logLevel ?? this.io.env[SP_CONSTANTS.ENV.LOG_LEVEL]);
      const logger = this.io.logger ? this.io.logger(level) : createLogger(level);
      this.cached = { logger, files: new FileService(logger), sp: new SealedPage({ logger }) };
    }
    return this.cached;
  }

  password(opts: CommonOptions): string {
    const password = opts.password ?? this.io.env[SP_CONSTANTS.ENV.PASSWORD];
    if (!password) {
      throw new ValidationError(`A password is required (--password or ${SP_CONSTANTS.ENV.PASSWORD})`);
    }
    return password;
  }

  async readStyle(path: string | undefined): Promise<string | undefined> {
    return path === undefined ? undefined : this.services.files.readText(path);
  }

  done(message: string): void {
    this.io.stdout(`${message}\n`);
  }
}

export function buildProgram(io: CliIo): Command {
  const program = new Command();
  const ctx = new CliContext(io, program);

  program
    .name("sealed-page")
    .description("Password-protect static HTML and Markdown documents")
    .version(VERSION, "-V, --version")
    .addOption(new Option("--log-level <level>", "log level for diagnostics on stderr").choices([
      "fatal", "error", "warn", "info", "debug", "trace", "silent"
    ]))
    .exitOverride()
    .configureOutput({ writeOut: io.stdout, writeErr: io.stderr })
    .showSuggestionAfterError();

  program
    .command("protect")
    .description("Create a password-protected HTML page from a Markdown or HTML file")
    .requiredOption("-i, --input <path>", "input .md or .html file")
    .option("-o, --output <path>", "output page (default: <input dir>/<stem>.protected.html)")
    .option("-p, --password <password>", `password (default: $${SP_CONSTANTS.ENV.PASSWORD})`)
    .option("--style <path>", "CSS file applied to the document and the prompt page")
    .option("--title <title>", "title shown on the prompt page")
    .option("--allow-unsafe-password", "skip password strength validation (unsafe)")
    .option("--no-minify", "keep the generated HTML unminified")
    .option("--format-version <n>", "token format version", parseFormatVersion)
    .action(async (opts: ProtectCliOptions) => {
      const kind = inferInputKind(opts.input);
      const password = ctx.password(opts);
      const { files, sp } = ctx.services;
      const [content, style] = await Promise.all([files.readText(opts.input), ctx.readStyle(opts.style)]);

      const page = await sp.protect({ content, kind }, password, {
        style,
        title: opts.title,
        allowUnsafe: opts.allowUnsafePassword,
        minify: opts.minify,
        version: opts.formatVersion
      });
      const output = opts.output ?? siblingPath(opts.input, ".protected.html");
      await files.writeText(output, page.html);
      ctx.done(`Protected page written to: ${output}`);
    });

  program
    .command("convert")
    .description("Convert a Markdown file to HTML")
    .requiredOption("-i, --input <path>", "input Markdown file")
    .option("-o, --output <path>", "output file (default: <input dir>/<stem>.html)")
    .option("--style <path>", "CSS file to embed")
    .option("--no-minify", "keep the generated HTML unminified")
    .action(async (opts: ConvertCliOptions) => {
      if (inferInputKind(opts.input) !== "markdown") {
        throw new ValidationError("convert expects a Markdown (.md) input");
      }
      const { files, sp } = ctx.services;
      const [markdown, style] = await Promise.all([files.readText(opts.input), ctx.readStyle(opts.style)]);

      const html = await sp.convert(markdown, { style, minify: opts.minify });
      const output = opts.output ?? siblingPath(opts.input, ".html");
      await files.writeText(output, html);
      ctx.done(`Converted ${opts.input} to ${output}`);
    });

  program
    .command("encrypt")
    .description("Encrypt an HTML file into a bare token")
    .requiredOption("-i, --input <path>", "input HTML file")
    .option("-o, --output <path>", "output token file (default: <input dir>/<stem>.token)")
    .option("-p, --password <password>", `password (default: $${SP_CONSTANTS.ENV.PASSWORD})`)
    .option("--allow-unsafe-password", "skip password strength validation (unsafe)")
    .option("--format-version <n>", "token format version", parseFormatVersion)
    .action(async (opts: EncryptCliOptions) => {
      const password = ctx.password(opts);
      const { files, sp } = ctx.services;
      const html = await files.readText(opts.input);

      const token = await sp.encrypt(html, password, {
        allowUnsafe: opts.allowUnsafePassword,
        version: opts.formatVersion
      });
      const output = opts.output ?? siblingPath(opts.input, ".token");
      await files.writeText(output, `${token}\n`);
      ctx.done(`Encrypted token written to: ${output}`);
    });

  program
    .command("decrypt")
    .description("Decrypt a token file or a protected HTML page")
    .requiredOption("-i, --input <path>", "token file or protected page")
    .option("-o, --output <path>", "output HTML file (default: <input dir>/<stem>.decrypted.html)")
    .option("-p, --password <password>", `password (default: $${SP_CONSTANTS.ENV.PASSWORD})`)
    .action(async (opts: CommonOptions) => {
      const password = ctx.password(opts);
      const { files, sp } = ctx.services;
      const text = await files.readText(opts.input);

      const token = /<html[\s>]|<script\b/i.test(text) ? sp.extractToken(text) : text;
      const html = await sp.decrypt(token, password);
      const stem = siblingPath(opts.input, "").replace(/\.protected$/, "");
      const output = opts.output ?? `${stem}.decrypted.html`;
      await files.writeText(output, html);
      ctx.done(`Decrypted file written to: ${output}`);
    });

  return program;
}

function reportError(io: CliIo, e: unknown): void {
  if (e instanceof WeakPasswordError) {
    io.stderr("error: password rejected\n");
    for (const reason of e.reasons) io.stderr(`  - ${reason.message}\n`);
    io.stderr("  (use --allow-unsafe-password to skip this check)\n");
    return;
  }
  if (e instanceof SealedPageError) {
    io.stderr(`error: ${e.message}\n`);
    return;
  }
  io.stderr(`error: ${describeError(e)}\n`);
}

/**
 * Runs one CLI invocation and resolves to the process exit code.
 * `argv` holds the user arguments only (no node/script prefix).
 */
export async function runCli(argv: readonly string[], io: CliIo): Promise<number> {
  const program = buildProgram(io);
  try {
    await program.parseAsync([...argv], { from: "user" });
    return 0;
  } catch (e) {
    if (e instanceof CommanderError) {
      // commander has already printed its own message
      return e.exitCode;
    }
    reportError(io, e);
    return 1;
  }
}
