import { play } from './parser'
import type { PlayOptions, PlayResult, ToneSink } from './types'
import { PLAY_OK } from './types'

/**
 * Malformed command character in a note string.
 * `character` is undefined when the input ended while a digit was expected.
 */
export class PlaySyntaxError extends Error {
  public readonly character: string | undefined

  constructor(
    public readonly source: string,
    public readonly position: number
  ) {
    const character = position < source.length ? source[position] : undefined
    super(
      character === undefined
        ? `Unexpected end of input at position ${position}`
        : `Unexpected '${character}' at position ${position}`
    )
    this.name = 'PlaySyntaxError'
    this.character = character
  }
}

export function isPlayError(result: PlayResult): boolean {
  return result !== PLAY_OK
}

/**
 * Render the source with a caret under the failing column.
 *
 * @example
 * formatSyntaxError('c4x', 2)
 * // c4x
 * //   ^
 */
export function formatSyntaxError(source: string, position: number): string {
  return `${source}\n${' '.repeat(position)}^`
}

/**
 * `play`, throwing a `PlaySyntaxError` instead of returning a position.
 */
export function playOrThrow(source: string, sink: ToneSink, options: PlayOptions = {}): void {
  const result = play(source, sink, options)
  if (isPlayError(result)) {
    throw new PlaySyntaxError(source, result)
  }
}
