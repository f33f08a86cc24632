import { flags } from '@oclif/command'
import { tqdm } from 'iterbar'
import _ from 'lodash'

import IterbarCommand, { progressFlags } from '../IterbarCommand'
import sleepSync from '../utils/sleep'


export default class Demo extends IterbarCommand {
    static description = 'iterate over a sequence while printing its progress to stderr'

    static flags = {
        ...progressFlags,
        size: flags.integer({
            description: "number of items to iterate",
            default: 1000
        }),
        delay: flags.integer({
            description: "milliseconds to spend on each item",
            default: 10
        })
    }

    async run() {
        const { flags } = this.parse(Demo)

        if (flags.size < 0) throw new Error("iterbar-cli: Size must not be negative")

        let checksum = 0
        for (const item of tqdm(_.range(flags.size), this.progressOptions(flags))) {
            sleepSync(flags.delay)
            checksum += item
        }

        this.log(`Processed ${flags.size} items (checksum ${checksum})`)
    }
}
