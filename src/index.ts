import { config } from 'dotenv'
config()

import { main } from './app'

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code
  },
  (error: unknown) => {
    console.error('Fatal error:', error)
    process.exitCode = 1
  }
)
