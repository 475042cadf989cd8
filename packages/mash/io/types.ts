import type { IoError, Result } from "@mash/core"

export type { IoError } from "@mash/core"

export type IoResult<T> = Result<T, IoError>
