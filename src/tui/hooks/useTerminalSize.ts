import { useEffect, useState } from 'react'
import { useStdout } from 'ink'

export interface TerminalSize {
  width: number
  height: number
}

const FALLBACK: TerminalSize = { width: 80, height: 24 }

export function useTerminalSize(): TerminalSize {
  const { stdout } = useStdout()
  const read = (): TerminalSize => ({
    width: stdout.columns || FALLBACK.width,
    height: stdout.rows || FALLBACK.height,
  })
  const [size, setSize] = useState<TerminalSize>(read)

  useEffect(() => {
    const onResize = () => setSize(read())
    stdout.on('resize', onResize)
    return () => {
      stdout.off('resize', onResize)
    }
  }, [stdout])

  return size
}
