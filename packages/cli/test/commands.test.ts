import fs from 'fs'
import path from 'path'

import Bar from '../src/commands/bar'
import Demo from '../src/commands/demo'


describe('commands', () => {
    it("should share the progress flags with demo only", () => {
        expect(Object.keys(Demo.flags)).toEqual(['help', 'title', 'interval', 'width', 'size', 'delay'])
        expect(Object.keys(Bar.flags)).toEqual(['help', 'fraction', 'width', 'glyphs'])
    })

    it("should describe the width of each command's own bar", () => {
        expect(Demo.flags.width.description).toBe("number of cells of the progress bar (default: $ITERBAR_BAR_WIDTH or 10)")
        expect(Bar.flags.width.description).toBe("number of cells (default: terminal width)")
    })
})

describe('launcher', () => {
    const root = path.join(__dirname, '..')

    it("should load the TypeScript commands through ts-node", () => {
        const launcher = fs.readFileSync(path.join(root, 'bin', 'run'), 'utf8')

        expect(launcher.split('\n')[0]).toBe("#!/usr/bin/env node")
        expect(launcher).toContain("require('ts-node').register(")
    })

    it("should ship the launcher, the sources and ts-node", () => {
        const manifest = JSON.parse(fs.readFileSync(path.join(root, 'package.json'), 'utf8'))

        expect(manifest.files).toEqual(['/bin', '/src'])
        expect(manifest.dependencies).toHaveProperty('ts-node')
        expect(manifest.oclif.commands).toBe('./src/commands')
    })
})
