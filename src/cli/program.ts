import { Command } from 'commander'
import { APP_NAME } from '../config/index.js'
import { downloadCommand, listCommand, type CliContext } from './commands.js'

export function createProgram(ctx: CliContext): Command {
  const program = new Command()

  program
    .name(APP_NAME)
    .description('List or download the images that a Blogger blog\'s posts link to')
    .argument('<blogUrl>', 'Blog address, e.g. http://myblog.blogspot.com')
    .argument('<apiKey>', 'Blogger API key')
    .argument('[destinationDir]', 'Download the images here instead of printing their URLs')
    .action(async (blogUrl: string, apiKey: string, destinationDir: string | undefined) => {
      if (destinationDir === undefined) {
        await listCommand(ctx, blogUrl, apiKey)
      } else {
        await downloadCommand(ctx, blogUrl, apiKey, destinationDir)
      }
    })

  return program
}
