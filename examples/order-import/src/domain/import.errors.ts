import { createError } from "@lineage/errors"

export const ErrImport = createError("order import")

export const ErrParse = ErrImport.wrap("parse")

/** Template for a rejected line, filled with its 1-based line number. */
export const ErrLine = ErrParse.wrapTemplate("line %d")

export const ErrRejected = ErrParse.wrapTemplate("%d of %d lines rejected")

export const ErrTooManyLines = ErrImport.wrapTemplate("more than %d lines")

export const ErrConfig = createError("config")
