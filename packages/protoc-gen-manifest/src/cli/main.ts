import process from 'node:process'
import { useLogger } from '@protomanifest/kit'
import { defineCommand } from 'citty'
import { description, version } from '../../package.json'
import { runManifestPlugin, STDIN_SOURCE } from '../core'

export const main = defineCommand({
  meta: {
    name: 'protoc-gen-manifest',
    description,
    version,
  },
  args: {
    import_prefix: {
      type: 'string',
      description: 'Prefix added to the import path of every proto file',
      default: '',
    },
    file: {
      type: 'string',
      description: 'Where to read the code generator request from',
      default: STDIN_SOURCE,
    },
    config: {
      type: 'string',
      description: 'Config file name, without extension',
    },
    skip_config: {
      type: 'boolean',
      description: 'Do not look for a config file',
      default: false,
    },
  },
  async run({ args }) {
    const logger = useLogger('protomanifest:cli')

    const outcome = await runManifestPlugin({
      file: args.file,
      importPrefix: args.import_prefix,
      configFile: args.skip_config ? false : args.config,
    })

    if (outcome.kind === 'fatal') {
      logger.error(`Fatal ${outcome.stage} failure: ${outcome.error.message}`)
      process.exitCode = 1
      return
    }
    process.exitCode = 0
  },
})
