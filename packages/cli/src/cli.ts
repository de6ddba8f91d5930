#!/usr/bin/env -S node --import tsx

import { HelpCommand, Kernel, ListLoader } from '@adonisjs/ace'
import CheckCommand from './commands/check.ts'

const version = '0.1.0'

async function main(): Promise<void> {
	const kernel = Kernel.create()

	kernel.info.set('binary', 'gta3sc')
	kernel.info.set('version', version)

	kernel.defineFlag('help', {
		alias: 'h',
		description: 'Display help information',
		type: 'boolean',
	})

	kernel.defineFlag('version', {
		alias: 'v',
		description: 'Display version number',
		type: 'boolean',
	})

	kernel.addLoader(new ListLoader([CheckCommand, HelpCommand]))

	kernel.on('version', async () => {
		kernel.ui.logger.log(`gta3sc ${version}`)
		return true
	})

	// Without a command, list the commands instead of failing the lookup.
	const argv = process.argv.slice(2)
	await kernel.handle(argv.length === 0 ? ['help'] : argv)
	process.exitCode = kernel.exitCode
}

main().catch((error: unknown) => {
	console.error(error)
	process.exit(1)
})
