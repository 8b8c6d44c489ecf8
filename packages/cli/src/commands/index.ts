import { ascii } from "./ascii"
import type { Command } from "./command"
import { decode } from "./decode"
import { demo } from "./demo"
import { encode } from "./encode"

export const commands: ReadonlyMap<string, Command> = new Map([
  ["ascii", ascii],
  ["decode", decode],
  ["demo", demo],
  ["encode", encode],
])

export type { CliIo, Command, CommandContext } from "./command"
