/**
 * keyseal CLI - Examples
 */

import type { Palette } from '../lib/colors.js'

interface Example {
  title: string
  commands: string[]
  note?: string
}

const EXAMPLES: Example[] = [
  {
    title: 'Generate a new private key into a file',
    commands: ['keyseal -g -o ~/.keyseal/key', 'chmod 600 ~/.keyseal/key']
  },
  {
    title: 'Generate a password-protected key and keep it in the keychain',
    commands: ['keyseal -g -p -x my-key -q'],
    note: 'The keychain is only offered on macOS'
  },
  {
    title: 'Encrypt a string with a key file',
    commands: ['keyseal -e -s "my secret" -K ~/.keyseal/key']
  },
  {
    title: 'Encrypt a file, then decrypt it again',
    commands: [
      'keyseal -e -f secrets.yml -o secrets.yml.enc -K ~/.keyseal/key',
      'keyseal -d -f secrets.yml.enc -o secrets.yml -K ~/.keyseal/key'
    ]
  },
  {
    title: 'Decrypt from stdin with a key pasted at the prompt',
    commands: ['cat secrets.yml.enc | keyseal -d -i']
  },
  {
    title: 'Edit an encrypted file in $EDITOR, keeping a backup',
    commands: ['keyseal -t -f secrets.yml.enc -K ~/.keyseal/key -b']
  }
]

export function renderExamples(palette: Palette): string {
  const { c } = palette
  const blocks = EXAMPLES.map(example => {
    const lines = [c.header(`# ${example.title}`)]
    for (const command of example.commands) {
      lines.push(`  ${c.command(command)}`)
    }
    if (example.note) {
      lines.push(`  ${c.muted(example.note)}`)
    }
    return lines.join('\n')
  })
  return blocks.join('\n\n')
}
