#!/usr/bin/env tsx
/**
 * tapeconv CLI - command line interface for ZX Spectrum tape conversion
 *
 * Entry point: parses top-level flags and dispatches to command handlers.
 */

import { Effect, Either, type Layer } from "effect"
import { realpathSync } from "node:fs"
import { pathToFileURL } from "node:url"
import { discoverConfig } from "./config/discovery.js"
import { loadConfigOrDefault, type TapeconvConfig } from "./config/loader.js"
import { runConvert } from "./commands/convert.js"
import { renderInspection, runInspect } from "./commands/inspect.js"
import { makeCliLoggerLayer, resolveLogLevel } from "./logging.js"
import type { OutputFormat } from "./output/formatter.js"

const VERSION = "0.1.0"

/**
 * Parsed CLI arguments
 */
interface ParsedArgs {
  readonly command: string | undefined
  readonly positionalArgs: readonly string[]
  readonly flags: {
    readonly help: boolean
    readonly version: boolean
    readonly config: string | undefined
    readonly json: boolean
    readonly yaml: boolean
    readonly csv: boolean
    readonly force: boolean
    readonly verbose: boolean
    readonly pause: number | undefined
  }
  /** Usage problems found while parsing, in argv order */
  readonly errors: readonly string[]
}

/**
 * Determine output format from flags
 */
function getOutputFormat(flags: ParsedArgs["flags"]): OutputFormat {
  if (flags.json) return "json"
  if (flags.yaml) return "yaml"
  if (flags.csv) return "csv"
  return "table"
}

const PAUSE_PATTERN = /^\d+$/

/**
 * Parse command line arguments.
 * Unknown flags, value flags without a value and a pause that is not a
 * whole number are reported in `errors` rather than thrown.
 */
function parseArgs(argv: readonly string[]): ParsedArgs {
  // Skip the runtime and script path
  const args = argv.slice(2)

  const flags = {
    help: false,
    version: false,
    config: undefined as string | undefined,
    json: false,
    yaml: false,
    csv: false,
    force: false,
    verbose: false,
    pause: undefined as number | undefined,
  }

  const positionalArgs: string[] = []
  const errors: string[] = []
  let command: string | undefined = undefined

  let i = 0
  while (i < args.length) {
    const arg = args[i]

    if (arg === "--help" || arg === "-h") {
      flags.help = true
      i++
    } else if (arg === "--version" || arg === "-v") {
      flags.version = true
      i++
    } else if (arg === "--config" || arg === "-c") {
      const value = args[i + 1]
      if (value === undefined || value === "") {
        errors.push(`Missing value for ${arg}`)
      } else {
        flags.config = value
      }
      i += 2
    } else if (arg === "--json") {
      flags.json = true
      i++
    } else if (arg === "--yaml") {
      flags.yaml = true
      i++
    } else if (arg === "--csv") {
      flags.csv = true
      i++
    } else if (arg === "--force" || arg === "-f") {
      flags.force = true
      i++
    } else if (arg === "--verbose") {
      flags.verbose = true
      i++
    } else if (arg === "--pause" || arg === "-p") {
      const value = args[i + 1]
      if (value === undefined) {
        errors.push(`Missing value for ${arg}`)
      } else if (!PAUSE_PATTERN.test(value)) {
        errors.push(`Invalid pause '${value}': expected a whole number of milliseconds`)
      } else {
        flags.pause = Number(value)
      }
      i += 2
    } else if (arg.startsWith("-")) {
      errors.push(`Unknown option: ${arg}`)
      i++
    } else {
      if (command === undefined) {
        command = arg
      } else {
        positionalArgs.push(arg)
      }
      i++
    }
  }

  return { command, positionalArgs, flags, errors }
}

/**
 * Print help message
 */
function printHelp(): void {
  console.log(`tapeconv v${VERSION}

Convert ZX Spectrum .tap cassette images to .tzx.

USAGE:
  tapeconv <command> [options]

COMMANDS:
  convert <input.tap> [output.tzx]  Convert a TAP image to TZX
  inspect <input.tap>               List the blocks of a TAP image

GLOBAL OPTIONS:
  -h, --help            Show this help message
  -v, --version         Show version
  -c, --config <path>   Path to config file (default: auto-discover tapeconv.config.json)
  --verbose             Log every conversion step to stderr

CONVERT OPTIONS:
  -p, --pause <ms>      Pause after each block (default: 1000)
  -f, --force           Replace an existing output file

INSPECT OPTIONS:
  --json                Output as JSON
  --yaml                Output as YAML
  --csv                 Output as CSV

EXAMPLES:
  tapeconv convert manic.tap
  tapeconv convert manic.tap out/manic.tzx --pause 500
  tapeconv inspect manic.tap --json | jq '.[] | .name'
`)
}

/**
 * Print version
 */
function printVersion(): void {
  console.log(`tapeconv v${VERSION}`)
}

/**
 * Print error and exit
 */
function exitWithError(message: string): never {
  console.error(`Error: ${message}`)
  process.exit(1)
}

/**
 * Discover and load the config file; defaults apply when there is none.
 */
async function resolveConfig(
  cwd: string,
  configOverride: string | undefined,
  logger: Layer.Layer<never>,
): Promise<TapeconvConfig> {
  const result = await Effect.runPromise(
    discoverConfig(cwd, configOverride).pipe(
      Effect.flatMap(loadConfigOrDefault),
      Effect.either,
      Effect.provide(logger),
    ),
  )

  if (Either.isLeft(result)) {
    exitWithError(result.left.message)
  }
  return result.right
}

async function handleConvert(
  args: ParsedArgs,
  cwd: string,
  config: TapeconvConfig,
  logger: Layer.Layer<never>,
): Promise<void> {
  const [input, output] = args.positionalArgs
  const result = await Effect.runPromise(
    runConvert({
      input,
      output,
      pauseMs: args.flags.pause ?? config.pauseMs,
      overwrite: args.flags.force || (config.overwrite ?? false),
      cwd,
    }).pipe(Effect.provide(logger)),
  )

  if (!result.success || result.data === undefined) {
    exitWithError(result.message ?? "Conversion failed")
  }

  console.log(
    `Converted ${result.data.blockCount} blocks from ${result.data.input} to ${result.data.output}`,
  )
}

async function handleInspect(
  args: ParsedArgs,
  cwd: string,
  logger: Layer.Layer<never>,
): Promise<void> {
  const result = await Effect.runPromise(
    runInspect({ input: args.positionalArgs[0], cwd }).pipe(Effect.provide(logger)),
  )

  if (!result.success || result.data === undefined) {
    exitWithError(result.message ?? "Inspection failed")
  }

  console.log(renderInspection(result.data, getOutputFormat(args.flags)))
}

/**
 * Main entry point. Returns normally on success; every failure prints
 * `Error: <message>` and exits with status 1.
 */
async function main(
  argv: readonly string[] = process.argv,
  cwd: string = process.cwd(),
): Promise<void> {
  const args = parseArgs(argv)

  if (args.errors.length > 0) {
    exitWithError(args.errors[0])
  }

  if (args.flags.version) {
    printVersion()
    return
  }

  if (args.flags.help || args.command === undefined) {
    printHelp()
    return
  }

  // The config file may raise the log level, so discovery logs at the flag's level
  const bootLogger = makeCliLoggerLayer(resolveLogLevel(args.flags.verbose, undefined))
  const config = await resolveConfig(cwd, args.flags.config, bootLogger)
  const logger = makeCliLoggerLayer(resolveLogLevel(args.flags.verbose, config.logLevel))

  switch (args.command) {
    case "convert":
      if (args.positionalArgs.length < 1 || args.positionalArgs.length > 2) {
        exitWithError("convert command requires an input file and an optional output file")
      }
      await handleConvert(args, cwd, config, logger)
      break

    case "inspect":
      if (args.positionalArgs.length !== 1) {
        exitWithError("inspect command requires an input file")
      }
      await handleInspect(args, cwd, logger)
      break

    default:
      exitWithError(`Unknown command: ${args.command}. Run 'tapeconv --help' for usage.`)
  }
}

// Export for testing
export { main, parseArgs, getOutputFormat, printHelp, printVersion }
export type { ParsedArgs }

/**
 * True when this module is the process entry point. The bin symlink is
 * resolved so `npx tapeconv` matches this module's URL.
 */
function isEntryPoint(): boolean {
  const script = process.argv[1]
  if (script === undefined) {
    return false
  }
  try {
    return import.meta.url === pathToFileURL(realpathSync(script)).href
  } catch {
    return false
  }
}

if (isEntryPoint()) {
  main().catch((error: unknown) => {
    console.error("Fatal error:", error)
    process.exit(1)
  })
}
