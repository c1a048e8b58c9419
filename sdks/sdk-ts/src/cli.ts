#!/usr/bin/env node
import { pathToFileURL } from "node:url";
import type { CanonicalOrdering } from "./canonicalize.js";
import { decodeDescriptor, encodeDescriptor, parseDescriptorId } from "./descriptor.js";
import { silentLogger } from "./logger.js";
import { staticRequestContext, type OptionFlag } from "./options.js";
import { DEFAULT_SECRET_VARIABLE, envSecret } from "./secret.js";
import { createUrlSigner, type UrlSigner } from "./signer.js";

type CLIOutput = {
  stdout(line: string): void;
  stderr(line: string): void;
};

const defaultOutput: CLIOutput = {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
};

function printHelp(output: CLIOutput = defaultOutput): void {
  output.stdout(`urlseal CLI

Usage:
  urlseal sign <url> [--option <flag>]... [--ip <address>] [--user-agent <ua>] [--order sorted|insertion] [--json]
  urlseal verify <url> [--ip <address>] [--user-agent <ua>] [--order sorted|insertion] [--json]
  urlseal descriptor <paymentId> <downloadId> <fileKey>
  urlseal descriptor --decode <value> [--json]

Environment:
  ${DEFAULT_SECRET_VARIABLE}   Installation key the signing secret is derived from
`);
}

function readFlagValue(args: string[], flag: string): string | undefined {
  const index = args.indexOf(flag);
  if (index === -1) {
    return undefined;
  }
  const value = args[index + 1];
  if (value === undefined) {
    throw new Error(`Missing value for ${flag}`);
  }
  return value;
}

function readFlagValues(args: string[], flag: string): string[] {
  const values: string[] = [];
  args.forEach((arg, index) => {
    if (arg !== flag) return;
    const value = args[index + 1];
    if (value === undefined) {
      throw new Error(`Missing value for ${flag}`);
    }
    values.push(value);
  });
  return values;
}

function hasFlag(args: string[], flag: string): boolean {
  return args.includes(flag);
}

function readOrdering(args: string[]): CanonicalOrdering {
  const order = readFlagValue(args, "--order") ?? "sorted";
  if (order !== "sorted" && order !== "insertion") {
    throw new Error(`Unknown --order value: ${order}`);
  }
  return order;
}

function buildSigner(args: string[], env: NodeJS.ProcessEnv): UrlSigner {
  return createUrlSigner({
    secret: envSecret({ env }),
    ordering: readOrdering(args),
    logger: silentLogger,
  });
}

function readContext(args: string[]) {
  return staticRequestContext({
    clientAddress: readFlagValue(args, "--ip"),
    userAgent: readFlagValue(args, "--user-agent"),
  });
}

/** Returns the process exit code. */
export function runCLI(
  args: string[],
  output: CLIOutput = defaultOutput,
  env: NodeJS.ProcessEnv = process.env,
): number {
  const command = args[0];

  if (!command || command === "-h" || command === "--help") {
    printHelp(output);
    return 0;
  }

  if (command === "sign") {
    const url = args[1];
    if (!url || url.startsWith("--")) {
      throw new Error("Usage: urlseal sign <url> [--option <flag>]...");
    }
    const optionValues = readFlagValues(args, "--option");
    const options: OptionFlag[] | undefined = optionValues.length > 0 ? optionValues : undefined;
    const signed = buildSigner(args, env).sign({ baseUrl: url, options }, readContext(args));

    if (hasFlag(args, "--json")) {
      output.stdout(JSON.stringify({ command: "sign", url: signed.url, token: signed.token }));
      return 0;
    }
    output.stdout(signed.url);
    return 0;
  }

  if (command === "verify") {
    const url = args[1];
    if (!url || url.startsWith("--")) {
      throw new Error("Usage: urlseal verify <url>");
    }
    const valid = buildSigner(args, env).verify(url, readContext(args));

    if (hasFlag(args, "--json")) {
      output.stdout(JSON.stringify({ command: "verify", valid }));
    } else {
      output.stdout(valid ? "valid" : "invalid");
    }
    return valid ? 0 : 1;
  }

  if (command === "descriptor") {
    const encoded = readFlagValue(args, "--decode");
    if (encoded !== undefined) {
      const descriptor = decodeDescriptor(encoded);
      if (hasFlag(args, "--json")) {
        output.stdout(JSON.stringify({ command: "descriptor", ...descriptor }));
        return 0;
      }
      output.stdout(`paymentId: ${descriptor.paymentId}`);
      output.stdout(`downloadId: ${descriptor.downloadId}`);
      output.stdout(`fileKey: ${descriptor.fileKey}`);
      return 0;
    }

    const [paymentRaw, downloadRaw, fileKey] = args.slice(1);
    if (!paymentRaw || !downloadRaw || !fileKey) {
      throw new Error("Usage: urlseal descriptor <paymentId> <downloadId> <fileKey>");
    }
    output.stdout(
      encodeDescriptor({
        paymentId: parseDescriptorId("paymentId", paymentRaw),
        downloadId: parseDescriptorId("downloadId", downloadRaw),
        fileKey,
      }),
    );
    return 0;
  }

  throw new Error(`Unknown command: ${command}`);
}

function run(): void {
  process.exitCode = runCLI(process.argv.slice(2), defaultOutput);
}

function isEntrypoint(): boolean {
  const entry = process.argv[1];
  return Boolean(entry) && import.meta.url === pathToFileURL(entry ?? "").href;
}

if (isEntrypoint()) {
  try {
    run();
  } catch (error) {
    defaultOutput.stderr(error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
}
