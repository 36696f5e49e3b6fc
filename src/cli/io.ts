import { createInterface } from 'readline/promises'
import { Writable } from 'stream'

/** Everything a command reads from or writes to the terminal. */
export type TCliIo = {
  out(text: string): void
  err(text: string): void
  prompt(question: string, options?: { hidden?: boolean }): Promise<string>
  confirm(question: string, defaultValue: boolean): Promise<boolean>
  readStdin(): Promise<string>
}

export function createTerminalIo(): TCliIo {
  let muted = false
  const output = new Writable({
    write(chunk: Buffer | string, encoding: BufferEncoding, callback: (error?: Error | null) => void) {
      if (!muted) process.stdout.write(chunk, encoding)
      callback()
    },
  })

  const ask = async (question: string, hidden: boolean): Promise<string> => {
    const readline = createInterface({ input: process.stdin, output, terminal: true })
    try {
      process.stdout.write(question)
      muted = hidden
      const answer = await readline.question('')
      return answer.trim()
    } finally {
      if (hidden) process.stdout.write('\n')
      muted = false
      readline.close()
    }
  }

  return {
    out: (text) => console.log(text),
    err: (text) => console.error(text),
    prompt: (question, options) => ask(question, options?.hidden ?? false),
    async confirm(question, defaultValue) {
      const answer = (await ask(`${question} [${defaultValue ? 'Y/n' : 'y/N'}]: `, false)).toLowerCase()
      if (!answer) return defaultValue
      return answer === 'y' || answer === 'yes'
    },
    async readStdin() {
      const chunks: Buffer[] = []
      for await (const chunk of process.stdin) {
        chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)))
      }
      return Buffer.concat(chunks).toString('utf8')
    },
  }
}
