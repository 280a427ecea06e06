export type {
  Annotations,
  RichSpan,
  ContentNode,
  ContentKind,
  TextKind,
  MediaKind,
  LinkKind,
  TextNode,
  CalloutNode,
  ToDoNode,
  CodeNode,
  DividerNode,
  LinkToPageNode,
  ChildPageNode,
  ChildDatabaseNode,
  MediaNode,
  LinkNode,
  EquationNode,
  TableNode,
  TableRowNode,
  UnsupportedNode,
} from './model.js';
export { NO_ANNOTATIONS } from './model.js';
export { parseBlock, parseBlocks } from './parse.js';
export { TreeHydrator } from './hydrator.js';
