export type HeadingLevel = 1 | 2 | 3 | 4 | 5 | 6

type NodeBase<T extends string> = { readonly type: T }
type NodeWithText<T extends string> = NodeBase<T> & { readonly text: string }
type NodeWithItems<T extends string> = NodeBase<T> & { readonly items: readonly string[] }

export type HeadingNode = NodeWithText<"heading"> & { readonly level: HeadingLevel }
export type ParagraphNode = NodeWithText<"paragraph">
export type UnorderedListNode = NodeWithItems<"unordered_list">
export type OrderedListNode = NodeWithItems<"ordered_list">
export type CodeBlockNode = NodeBase<"code_block"> & {
  readonly language: string
  readonly code: string
}

export type BlockNode =
  | HeadingNode
  | ParagraphNode
  | UnorderedListNode
  | OrderedListNode
  | CodeBlockNode

export interface BlockVisitor<R> {
  heading(node: HeadingNode): R
  paragraph(node: ParagraphNode): R
  unorderedList(node: UnorderedListNode): R
  orderedList(node: OrderedListNode): R
  codeBlock(node: CodeBlockNode): R
}

export function visitBlock<R>(node: BlockNode, visitor: BlockVisitor<R>): R {
  switch (node.type) {
    case "heading":
      return visitor.heading(node)
    case "paragraph":
      return visitor.paragraph(node)
    case "unordered_list":
      return visitor.unorderedList(node)
    case "ordered_list":
      return visitor.orderedList(node)
    case "code_block":
      return visitor.codeBlock(node)
    default:
      return assertNever(node)
  }
}

export function assertNever(node: never): never {
  throw new Error(`Unhandled block node: ${JSON.stringify(node)}`)
}
