/**
 * keyseal CLI orchestrator
 *
 * parse → display short-circuits → select command → resolve key plan →
 * select output → acquire key → execute → emit. Any failure lands in a single
 * error path that renders a structured record on stderr and returns the exit
 * code for its kind.
 */

import type { Capabilities, KeysealConfig, OptionModel } from '../types.js'
import { listFlagNames, stripDictionary } from '../lib/options.js'
import { selectCommand } from '../lib/command-selector.js'
import { resolveKeyPlan } from '../lib/key-resolver.js'
import { selectOutput, writeToSink } from '../lib/output-selector.js'
import { acquireKey } from '../lib/key-loader.js'
import { exitCodeFor, isKeysealError, toErrorRecord } from '../lib/errors.js'
import { createPalette, resolveRenderMode, type Palette } from './lib/colors.js'
import { createReporter, renderError, type Reporter, type Streams } from './ui.js'
import { createKeysealCli, parseArgv, PROGRAM_NAME, VERSION } from './schema.js'
import type { CommandContext, Services } from './commands/context.js'
import { runGenerate } from './commands/generate.js'
import { runEncrypt } from './commands/encrypt.js'
import { runDecrypt } from './commands/decrypt.js'
import { runEdit } from './commands/edit.js'
import { renderExamples } from './commands/examples.js'
import { appendCompletion } from './commands/completion.js'

export interface CliDependencies {
  streams: Streams
  env: NodeJS.ProcessEnv
  /** stderr is a terminal (decides default coloring) */
  isTTY: boolean
  capabilities: Capabilities
  /** Loaded lazily so a broken config file surfaces as a rendered error */
  loadConfig: () => KeysealConfig
  /** Built once the config is known */
  createServices: (config: KeysealConfig) => Services
}

/**
 * Display-only flags, in precedence order
 */
function runDisplayFlags(
  model: OptionModel,
  argv: string[],
  deps: CliDependencies,
  palette: Palette,
  reporter: Reporter
): boolean {
  if (model.version) {
    reporter.output(`${PROGRAM_NAME} v${VERSION}`)
    return true
  }

  if (model.help || argv.length === 0) {
    reporter.output(createKeysealCli(deps.capabilities, palette).help([]))
    return true
  }

  if (model.examples) {
    reporter.output(renderExamples(palette))
    return true
  }

  if (model.bashCompletion !== undefined) {
    const script = createKeysealCli(deps.capabilities, palette).completion('bash')
    if (appendCompletion(model.bashCompletion, script)) {
      reporter.success(`Bash completion appended to ${model.bashCompletion}`)
    } else {
      reporter.log(`Bash completion already present in ${model.bashCompletion}`)
    }
    return true
  }

  return false
}

/**
 * Run the selected command; resolves to the payload, or null when the
 * command reports on stderr only
 */
async function runCommand(context: CommandContext): Promise<string | null> {
  const { command, keyPlan, services, reporter } = context
  if (command.kind === 'generate') {
    return runGenerate(context)
  }

  const key = await acquireKey(keyPlan, {
    crypto: services.crypto,
    keychain: services.keychain,
    input: services.input,
    passwordCache: services.passwordCache,
    log: message => reporter.verbose(message)
  })

  switch (command.kind) {
    case 'encrypt':
      return runEncrypt(context, key)
    case 'decrypt':
      return runDecrypt(context, key)
    case 'edit':
      await runEdit(context, key)
      return null
  }
}

async function execute(model: OptionModel, config: KeysealConfig, deps: CliDependencies, reporter: Reporter): Promise<void> {
  const command = selectCommand(model)
  for (const flag of command.ignored) {
    reporter.warn(`${flag} has no effect with --${command.kind}, ignoring`)
  }

  const keyPlan = resolveKeyPlan(model, config)
  for (const flag of keyPlan.ignored) {
    reporter.warn(`${flag} ignored: the key is taken from ${keyPlan.source.type}`)
  }

  const sink = selectOutput(model)
  reporter.debug(`command=${command.kind} key=${keyPlan.source.type} output=${sink.type}`)

  const services = deps.createServices(config)
  const context: CommandContext = { model, command, keyPlan, config, services, reporter }

  const payload = await runCommand(context)
  if (payload === null) return

  writeToSink(sink, payload, { stdout: deps.streams.stdout })
  if (sink.type === 'file') {
    reporter.verbose(`Output written to ${sink.path}`)
  }
}

/**
 * Run one invocation; resolves to the process exit code
 */
export async function runCli(rawArgv: string[], deps: CliDependencies): Promise<number> {
  const { argv, dictionary } = stripDictionary(rawArgv)

  if (dictionary) {
    deps.streams.stdout(`${listFlagNames(deps.capabilities)}\n`)
    return 0
  }

  let model: OptionModel | null = null
  let reporter = createReporter(deps.streams, {
    palette: createPalette(resolveRenderMode({ noColor: false }, deps.env, deps.isTTY)),
    quiet: false,
    verbose: false,
    debug: false
  })

  try {
    const parsed = parseArgv(createKeysealCli(deps.capabilities, reporter.palette), argv, deps.capabilities)
    model = parsed
    const reporterFor = (configColor?: boolean) => createReporter(deps.streams, {
      palette: createPalette(resolveRenderMode(parsed, deps.env, deps.isTTY, configColor)),
      quiet: parsed.quiet,
      verbose: parsed.verbose,
      debug: parsed.debug
    })

    // Display flags never depend on the config file
    reporter = reporterFor()
    if (runDisplayFlags(parsed, argv, deps, reporter.palette, reporter)) {
      return 0
    }

    const config = deps.loadConfig()
    reporter = reporterFor(config.color)

    await execute(parsed, config, deps, reporter)
    return 0
  } catch (err) {
    const record = toErrorRecord(err, model, { trace: model?.trace ?? false })
    renderError(reporter, record, { quiet: model?.quiet ?? false, debug: model?.debug ?? false })
    return isKeysealError(err) ? exitCodeFor(err.kind) : 1
  }
}
