import { createInterface } from 'node:readline'

export type IO = {
  stdout: (text: string) => void
  stderr: (text: string) => void
  /** Ask one question. Resolves to null when input is closed or interrupted. */
  prompt: (question: string) => Promise<string | null>
  /** False when stdin is piped or redirected; prompts would then block or read garbage. */
  isInteractive: boolean
}

export function createProcessIO(): IO {
  return {
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
    prompt: (question) => askQuestion(question),
    isInteractive: Boolean(process.stdin.isTTY),
  }
}

function askQuestion(question: string): Promise<string | null> {
  return new Promise((resolve) => {
    const rl = createInterface({ input: process.stdin, output: process.stdout })
    let answered = false
    rl.on('SIGINT', () => rl.close())
    rl.on('close', () => {
      if (!answered) {
        process.stdout.write('\n')
        resolve(null)
      }
    })
    rl.question(question, (answer) => {
      answered = true
      rl.close()
      resolve(answer)
    })
  })
}
