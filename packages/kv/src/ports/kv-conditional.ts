export type KvWriteResult = { readonly kind: "written" } | { readonly kind: "skipped" }
