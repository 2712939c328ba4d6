/**
 * CLI for arcfs - archive operations
 *
 * Commands:
 * - create <source> <archive>          - pack a directory into a new archive
 * - ls <archive> [path]                - list a directory of an archive
 * - cat <archive> <path>               - print a file of an archive
 * - add <archive> <file> [dest]        - add a file to an archive
 * - rm <archive> <path>                - remove a file or directory
 * - extract <archive> <target> [path]  - extract into a real directory
 * - search <archive> <query>           - find entries by name
 */

import { cac } from 'cac'
import { createArchive } from '../archive/factory.js'
import type { Archive } from '../core/archive.js'
import { resolveDirectory, resolveFile, resolveParent } from '../core/path.js'
import type { Result } from '../core/result.js'
import { directoryPath, filePath } from '../core/types.js'
import type { CLIContext, CommandResult, LayerOptions } from './types.js'
import { VERSION } from './version.js'
import {
  normalizeCLIPath,
  formatLsOutput,
  formatSearchOutput,
  listEntries,
  formatError,
  getResultMessage,
  missingArgumentError,
  unknownCommandError,
} from './utils/index.js'
import { mainHelp, getCommandHelp } from './help.js'

// Re-export formatLsOutput for tests
export { formatLsOutput } from './utils/index.js'
export type { CLIContext, CommandResult } from './types.js'

/** Parsed option values as cac hands them over */
type OptionValues = Record<string, unknown>

interface Invocation {
  args: string[]
  options: OptionValues
  layers: LayerOptions
  context: CLIContext
}

/**
 * Create and return the CLI instance with all commands registered
 */
export function createCLI(): { name: string; commands: string[]; cli: ReturnType<typeof cac> } {
  const cli = cac('arcfs')

  cli.version(VERSION)

  cli.option('--gzip', 'Content is gzip-compressed')
  cli.option('--password <password>', 'Content is encrypted with this passphrase')

  cli.command('create <source> <archive>', 'pack a directory into a new archive')

  cli.command('ls <archive> [path]', 'list a directory of an archive')
    .option('-l, --long', 'Show entry type and stored size')
    .option('-r, --recursive', 'List subdirectories too')

  cli.command('cat <archive> <path>', 'print a file of an archive')

  cli.command('add <archive> <file> [dest]', 'add a file to an archive')
    .option('-f, --force', 'Replace an existing file')

  cli.command('rm <archive> <path>', 'remove a file or directory from an archive')
    .option('-d, --dir', 'Remove a directory and everything in it')

  cli.command('extract <archive> <target> [path]', 'extract an archive into a directory')

  cli.command('search <archive> <query>', 'find files and directories by name')
    .option('-r, --recursive', 'Search subdirectories too')

  return {
    name: 'arcfs',
    commands: ['create', 'ls', 'cat', 'add', 'rm', 'extract', 'search'],
    cli,
  }
}

/**
 * Execute a CLI command with the given arguments and context
 */
export async function runCLI(args: string[], context: CLIContext): Promise<CommandResult> {
  const { stdout, stderr } = context

  // Handle --version and -v
  if (args.includes('--version') || args.includes('-v')) {
    stdout(VERSION)
    return { exitCode: 0 }
  }

  // Handle --help and -h at root level
  if (args.length === 0 || (args.length === 1 && (args[0] === '--help' || args[0] === '-h'))) {
    stdout(mainHelp())
    return { exitCode: 0 }
  }

  const command = args[0] ?? ''

  // Handle command-specific help
  if (args.includes('--help') || args.includes('-h')) {
    const helpText = getCommandHelp(command)
    if (helpText) {
      stdout(helpText)
      return { exitCode: 0 }
    }
  }

  const { cli, commands } = createCLI()
  if (!commands.includes(command)) {
    stderr(unknownCommandError(command))
    return { exitCode: 1, error: `unknown command '${command}'` }
  }

  try {
    const parsed = cli.parse(['node', 'arcfs', ...args], { run: false })
    const options: OptionValues = parsed.options
    const invocation: Invocation = {
      args: parsed.args.map((arg) => String(arg)),
      options,
      layers: {
        gzip: options.gzip === true,
        password: options.password === undefined ? undefined : String(options.password),
      },
      context,
    }

    switch (command) {
      case 'create':
        return await executeCreate(invocation)
      case 'ls':
        return await executeLs(invocation)
      case 'cat':
        return await executeCat(invocation)
      case 'add':
        return await executeAdd(invocation)
      case 'rm':
        return await executeRm(invocation)
      case 'extract':
        return await executeExtract(invocation)
      default:
        return await executeSearch(invocation)
    }
  } catch (err: unknown) {
    const message = formatError(command, err)
    stderr(message)
    return { exitCode: 1, error: message }
  }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Report a missing positional argument
 */
function missing(command: string, argName: string, context: CLIContext): CommandResult {
  context.stderr(missingArgumentError(command, argName))
  return { exitCode: 1, error: `missing ${argName} argument` }
}

/**
 * Throw the result's error (or `fallback`) when it failed
 */
function ensure(result: Result<unknown>, fallback: string): void {
  if (!result.success) {
    throw new Error(getResultMessage(result, fallback))
  }
}

function archiveFor(invocation: Invocation, archivePath?: string): Archive {
  return createArchive({
    storage: invocation.context.storage,
    archivePath,
    compress: invocation.layers.gzip,
    password: invocation.layers.password,
  })
}

async function openArchive(invocation: Invocation, archivePath: string): Promise<Archive> {
  const archive = archiveFor(invocation)
  ensure(await archive.read(filePath(archivePath)), `cannot read archive '${archivePath}'`)
  return archive
}

// =============================================================================
// Commands
// =============================================================================

/**
 * Execute create command
 */
async function executeCreate(invocation: Invocation): Promise<CommandResult> {
  const [source, archivePath] = invocation.args
  if (!source) return missing('create', 'source', invocation.context)
  if (!archivePath) return missing('create', 'archive', invocation.context)

  const archive = archiveFor(invocation, archivePath)
  ensure(await archive.create(directoryPath(source)), `cannot create archive '${archivePath}'`)
  invocation.context.stdout(`created ${archivePath} (${archive.tree.fileCount} files)`)
  return { exitCode: 0 }
}

/**
 * Execute ls command
 */
async function executeLs(invocation: Invocation): Promise<CommandResult> {
  const [archivePath, path = ''] = invocation.args
  if (!archivePath) return missing('ls', 'archive', invocation.context)

  const archive = await openArchive(invocation, archivePath)
  const directory = resolveDirectory(normalizeCLIPath(path), archive.root)
  if (!directory) {
    throw new Error(`no such directory '${path}'`)
  }

  const entries = listEntries(directory, invocation.options.recursive === true)
  if (entries.length > 0) {
    invocation.context.stdout(formatLsOutput(entries, { long: invocation.options.long === true }))
  }
  return { exitCode: 0 }
}

/**
 * Execute cat command
 */
async function executeCat(invocation: Invocation): Promise<CommandResult> {
  const [archivePath, path] = invocation.args
  if (!archivePath) return missing('cat', 'archive', invocation.context)
  if (!path) return missing('cat', 'path', invocation.context)

  const archive = await openArchive(invocation, archivePath)
  const text = await archive.readAllText(normalizeCLIPath(path))
  if (!text.success) {
    throw new Error(getResultMessage(text, `no such file '${path}'`))
  }
  invocation.context.stdout(text.value)
  return { exitCode: 0 }
}

/**
 * Execute add command
 */
async function executeAdd(invocation: Invocation): Promise<CommandResult> {
  const { storage } = invocation.context
  const [archivePath, source, dest] = invocation.args
  if (!archivePath) return missing('add', 'archive', invocation.context)
  if (!source) return missing('add', 'file', invocation.context)

  const archive = await openArchive(invocation, archivePath)
  const target = normalizeCLIPath(dest ?? storage.basename(source))
  const parent = resolveParent(target, archive.root)
  if (!parent) {
    throw new Error(`no such directory for '${dest ?? source}'`)
  }

  const data = await storage.readFile(source)
  const written = await archive.writeAllBytes(data, parent.name, parent.directory, invocation.options.force === true)
  ensure(written, `file exists '${target}' (use --force to replace it)`)
  ensure(await archive.save(), `cannot save archive '${archivePath}'`)
  return { exitCode: 0 }
}

/**
 * Execute rm command
 */
async function executeRm(invocation: Invocation): Promise<CommandResult> {
  const [archivePath, path] = invocation.args
  if (!archivePath) return missing('rm', 'archive', invocation.context)
  if (!path) return missing('rm', 'path', invocation.context)

  const archive = await openArchive(invocation, archivePath)
  const target = normalizeCLIPath(path)
  const removed = invocation.options.dir === true
    ? await archive.removeDirectory(target)
    : await archive.removeFile(target)
  ensure(removed, `no such ${invocation.options.dir === true ? 'directory' : 'file'} '${path}'`)
  ensure(await archive.save(), `cannot save archive '${archivePath}'`)
  return { exitCode: 0 }
}

/**
 * Execute extract command
 */
async function executeExtract(invocation: Invocation): Promise<CommandResult> {
  const [archivePath, target, path] = invocation.args
  if (!archivePath) return missing('extract', 'archive', invocation.context)
  if (!target) return missing('extract', 'target', invocation.context)

  const archive = await openArchive(invocation, archivePath)
  const destination = directoryPath(target)

  if (path === undefined) {
    ensure(await archive.extract(destination), `cannot extract into '${target}'`)
    return { exitCode: 0 }
  }

  const entry = normalizeCLIPath(path)
  const file = resolveFile(entry, archive.root)
  if (file) {
    ensure(await archive.extractFiles([file], destination), `cannot extract '${path}'`)
    return { exitCode: 0 }
  }
  const directory = resolveDirectory(entry, archive.root)
  if (!directory) {
    throw new Error(`no such file or directory '${path}'`)
  }
  ensure(await archive.extractDirectory(directory, destination), `cannot extract '${path}'`)
  return { exitCode: 0 }
}

/**
 * Execute search command
 */
async function executeSearch(invocation: Invocation): Promise<CommandResult> {
  const [archivePath, query] = invocation.args
  if (!archivePath) return missing('search', 'archive', invocation.context)
  if (query === undefined) return missing('search', 'query', invocation.context)

  const archive = await openArchive(invocation, archivePath)
  const result = archive.search(query, archive.root, invocation.options.recursive === true)
  if (result.directories.length + result.files.length > 0) {
    invocation.context.stdout(formatSearchOutput(result))
  }
  return { exitCode: 0 }
}
