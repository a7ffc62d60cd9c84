import type { StepLineConfigFile } from '@stepline/cli/types'

const cargo = [process.execPath, 'stubs/cargo-stub.cjs']

const config = {
  name: 'Smoke',
  on: { push: { branches: ['main'] } },
  output: {
    format: 'pretty',
    verbose: false,
  },
  jobs: {
    quality: {
      name: 'Code Quality',
      steps: [
        { id: 'clippy', name: 'Clippy', command: [...cargo, 'clippy'] },
        { id: 'fmt', name: 'Format', command: cargo, args: 'fmt --check' },
      ],
    },
  },
} satisfies StepLineConfigFile

export default config
