export type SelectorNode =
  | IdentifierNode
  | LiteralNode
  | UnaryNode
  | BinaryNode
  | BetweenNode
  | InNode
  | LikeNode
  | IsNullNode;

export type LiteralValue =
  | { type: 'string'; value: string }
  | { type: 'exact'; value: bigint }
  | { type: 'approx'; value: number }
  | { type: 'boolean'; value: boolean };

export type LogicalOperator = 'and' | 'or';

export type ArithmeticOperator = '+' | '-' | '*' | '/';

export type ComparisonOperator = '=' | '<>' | '>' | '<' | '>=' | '<=';

export type BinaryOperator = LogicalOperator | ArithmeticOperator | ComparisonOperator;

export type IdentifierNode = {
  readonly kind: 'identifier';
  readonly name: string;
};

export type LiteralNode = {
  readonly kind: 'literal';
  readonly value: LiteralValue;
};

export type UnaryNode = {
  readonly kind: 'unary';
  readonly op: 'not' | 'neg';
  readonly operand: SelectorNode;
};

export type BinaryNode = {
  readonly kind: 'binary';
  readonly op: BinaryOperator;
  readonly left: SelectorNode;
  readonly right: SelectorNode;
};

export type BetweenNode = {
  readonly kind: 'between';
  readonly value: SelectorNode;
  readonly low: SelectorNode;
  readonly high: SelectorNode;
  readonly negated: boolean;
};

export type InNode = {
  readonly kind: 'in';
  readonly value: SelectorNode;
  readonly list: readonly LiteralNode[];
  readonly negated: boolean;
};

export type LikeNode = {
  readonly kind: 'like';
  readonly value: SelectorNode;
  readonly pattern: string;
  readonly escape: string | null;
  readonly negated: boolean;
};

export type IsNullNode = {
  readonly kind: 'isNull';
  readonly value: IdentifierNode;
  readonly negated: boolean;
};
