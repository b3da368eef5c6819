/**
 * The built-in category table.
 *
 * The set is closed: DefaultCategoryName is the union of its identifiers and
 * prerequisites are checked against it at compile time.
 */

import { join } from 'path';
import { defineCategory, defineCommand, defineLocation, type CategoryCatalog } from './definitions.js';

export const DEFAULT_CATEGORY_NAMES = ['BASH', 'BREW', 'GIT', 'SH', 'VSCODE', 'ZSH'] as const;

export type DefaultCategoryName = (typeof DEFAULT_CATEGORY_NAMES)[number];

const ZSHRC_URL = 'https://raw.githubusercontent.com/grml/grml-etc-core/master/etc/zsh/zshrc';

function everywhere(path: string) {
  return { linux: path, darwin: path, windows: path };
}

export function buildDefaultCatalog(repositoryRoot: string): CategoryCatalog<DefaultCategoryName> {
  return Object.freeze({
    BASH: defineCategory<DefaultCategoryName>({
      prerequisites: ['SH'],
      locations: [
        defineLocation('bash/bash_profile', everywhere('$HOME/.bash_profile')),
        defineLocation('bash/bashrc', everywhere('$HOME/.bashrc'))
      ]
    }),

    BREW: defineCategory<DefaultCategoryName>({
      // https://docs.brew.sh/Manpage#bundle-subcommand
      locations: [defineLocation('brew/Brewfile', everywhere('$HOME/.Brewfile'))],
      afterInstall: [defineCommand('brew', 'bundle', 'upgrade', '--global')]
    }),

    GIT: defineCategory<DefaultCategoryName>({
      locations: [defineLocation('git/config', everywhere('$HOME/.gitconfig'))]
    }),

    SH: defineCategory<DefaultCategoryName>({
      locations: [
        defineLocation('sh/inputrc', everywhere('$HOME/.inputrc')),
        defineLocation('sh/profile', everywhere('$HOME/.profile'))
      ]
    }),

    VSCODE: defineCategory<DefaultCategoryName>({
      // https://code.visualstudio.com/docs/getstarted/settings#_settings-file-locations
      locations: [
        defineLocation('vscode/User/', {
          linux: '$HOME/.config/Code/User/',
          darwin: '$HOME/Library/Application Support/Code/User/',
          windows: '%APPDATA%/Code/User/'
        })
      ],
      afterInstall: [
        defineCommand(
          'code',
          '--install-extension', 'ms-python.python',
          '--install-extension', 'rust-lang.rust-analyzer',
          '--install-extension', 'vscodevim.vim'
        )
      ]
    }),

    ZSH: defineCategory<DefaultCategoryName>({
      prerequisites: ['SH'],
      beforeInstall: [
        defineCommand('curl', '--silent', '--show-error', ZSHRC_URL, '--output', join(repositoryRoot, 'zsh', 'zshrc'))
      ],
      // https://wiki.archlinux.org/title/Zsh#Startup/Shutdown_files
      locations: [
        defineLocation('zsh/zshenv', { linux: '$HOME/.zshenv', darwin: '$HOME/.zshenv' }),
        defineLocation('zsh/zshrc.pre', { linux: '$HOME/.zshrc.pre', darwin: '$HOME/.zshrc.pre' }),
        defineLocation('zsh/zshrc', { linux: '$HOME/.zshrc', darwin: '$HOME/.zshrc' }),
        defineLocation('zsh/zshrc.local', { linux: '$HOME/.zshrc.local', darwin: '$HOME/.zshrc.local' })
      ]
    })
  });
}
