/**
 * Help text for CLI commands
 */

import { VERSION } from './version.js'

const LAYER_OPTIONS = `  --gzip                 Content is gzip-compressed
  --password <password>  Content is encrypted with this passphrase`

/**
 * Main help text shown with --help or no arguments
 */
export function mainHelp(): string {
  return `arcfs/${VERSION}

Usage:
  $ arcfs <command> [options]

Commands:
  create <source> <archive>      pack a directory into a new archive
  ls <archive> [path]            list a directory of an archive
  cat <archive> <path>           print a file of an archive
  add <archive> <file> [dest]    add a file to an archive
  rm <archive> <path>            remove a file or directory from an archive
  extract <archive> <target> [path]  extract an archive into a directory
  search <archive> <query>       find files and directories by name

For more info, run any command with the --help flag:
  $ arcfs create --help
  $ arcfs ls --help

Paths inside an archive may use / or \\ as separator.

Options:
${LAYER_OPTIONS}
  -v, --version          Display version number
  -h, --help             Display this message
`
}

function commandHelp(usage: string, options: string[], description: string): string {
  return `arcfs/${VERSION}

Usage:
  $ arcfs ${usage}

Options:
${[...options, LAYER_OPTIONS, '  -h, --help             Display this message'].join('\n')}

Description:
  ${description}
`
}

/**
 * Help text for create command
 */
export function createHelp(): string {
  return commandHelp('create <source> <archive>', [], 'pack everything inside a directory into a new archive')
}

/**
 * Help text for ls command
 */
export function lsHelp(): string {
  return commandHelp(
    'ls <archive> [path]',
    ['  -l, --long             Show entry type and stored size', '  -r, --recursive        List subdirectories too'],
    'list a directory of an archive'
  )
}

/**
 * Help text for cat command
 */
export function catHelp(): string {
  return commandHelp('cat <archive> <path>', [], 'print a file of an archive')
}

/**
 * Help text for add command
 */
export function addHelp(): string {
  return commandHelp(
    'add <archive> <file> [dest]',
    ['  -f, --force            Replace an existing file'],
    'add a file to an archive, at [dest] or under its own name in the root'
  )
}

/**
 * Help text for rm command
 */
export function rmHelp(): string {
  return commandHelp(
    'rm <archive> <path>',
    ['  -d, --dir              Remove a directory and everything in it'],
    'remove a file or directory from an archive'
  )
}

/**
 * Help text for extract command
 */
export function extractHelp(): string {
  return commandHelp(
    'extract <archive> <target> [path]',
    [],
    'extract the whole archive, or one file or directory of it, into a directory'
  )
}

/**
 * Help text for search command
 */
export function searchHelp(): string {
  return commandHelp(
    'search <archive> <query>',
    ['  -r, --recursive        Search subdirectories too'],
    'find files (and, recursively, directories) whose name contains the query, ignoring case'
  )
}

/**
 * Get help text for a specific command
 */
export function getCommandHelp(command: string): string | null {
  switch (command) {
    case 'create': return createHelp()
    case 'ls': return lsHelp()
    case 'cat': return catHelp()
    case 'add': return addHelp()
    case 'rm': return rmHelp()
    case 'extract': return extractHelp()
    case 'search': return searchHelp()
    default: return null
  }
}
