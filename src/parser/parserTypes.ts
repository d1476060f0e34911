export type ArgDirection = 'in' | 'out' | 'inout' | 'unknown';

export type ReturnDirection = 'ret';

export type Direction = ArgDirection | ReturnDirection;

export type ArgumentEntry = {
  /** May be a comma-joined list of parameter names sharing one description. */
  name: string;
  /** The type as written in the comment; informational only. */
  declaredType: string;
  description: string;
};

export type DocumentationBlock = {
  readonly inputs: readonly ArgumentEntry[];
  readonly outputs: readonly ArgumentEntry[];
};

export type SignatureArgument = {
  readonly kind: 'param';
  readonly rawDeclaration: string;
  readonly name: string;
  readonly baseType: string;
  readonly callType: string;
  readonly direction: ArgDirection;
};

export type ReturnSlot = {
  readonly kind: 'return';
  readonly name: 'ret';
  readonly baseType: string;
  readonly callType: string;
  readonly direction: ReturnDirection;
};

export type FunctionArgument = SignatureArgument | ReturnSlot;

/** Fields a direction query may project to. */
export type ArgumentField = 'name' | 'baseType' | 'callType' | 'direction';

export type HeaderFunction = {
  section: string;
  subsection: string;
  name: string;
  /** Return type and name as declared in the header, used to skip call sites. */
  anchor: string;
};
