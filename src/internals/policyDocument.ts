import { Atom, Literal, Rule, Term } from "./datalog/syntax";
import {
  atom,
  constant,
  literal,
  rule,
  variable,
} from "./datalog/syntaxConstructors";
import { throwZodError, ExecutionException } from "./exceptions";
import { TheoryVariant } from "./theory/checks";
import path from "path";
import { z } from "zod";

const ConstantSchema = z.union([z.string(), z.number().finite()]);

const TermSchema = z.union([
  ConstantSchema,
  z.object({ var: z.string().min(1) }).strict(),
]);

const AtomSchema = z.object({
  table: z.string().min(1),
  args: z.array(TermSchema).optional().default([]),
  theory: z.string().min(1).optional(),
});

const LiteralSchema = AtomSchema.extend({
  negated: z.boolean().optional().default(false),
});

const RuleSchema = z.object({
  head: AtomSchema,
  body: z.array(LiteralSchema).optional().default([]),
});

const PolicyDocumentSchema = z.object({
  theory: z.string().min(1).optional(),
  kind: z.enum(["nonrecursive", "action", "unsafe"]).optional(),
  rules: z.array(RuleSchema).optional().default([]),
  facts: z.record(z.array(z.array(ConstantSchema))).optional().default({}),
});

type TermJson = z.infer<typeof TermSchema>;
type AtomJson = z.infer<typeof AtomSchema>;
type LiteralJson = z.infer<typeof LiteralSchema>;

/**
 * Contents of a JSON policy document.
 */
export type PolicyDocument = {
  /** Path the document was read from. */
  file: string;
  /** Theory the document populates. Defaults to the file name. */
  theory: string;
  kind: TheoryVariant | undefined;
  rules: Rule[];
  /** Tables listed under `facts`, including those with no rows. */
  tables: string[];
  facts: Atom[];
};

function toTerm(term: TermJson): Term {
  return typeof term === "object" ? variable(term.var) : constant(term);
}

function toAtom(value: AtomJson): Atom {
  return atom(
    value.table,
    value.args.map(toTerm),
    value.theory === undefined ? {} : { theory: value.theory },
  );
}

function toLiteral(value: LiteralJson): Literal {
  return literal(toAtom(value), value.negated);
}

/**
 * Parses a JSON policy document.
 *
 * @param text Contents of the document.
 * @param file Path of the document, used for diagnostics and as the default
 *             theory name.
 * @throws An ExecutionException if the document is not valid.
 */
export function parsePolicyDocument(text: string, file: string): PolicyDocument {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    throw ExecutionException.make(
      `Cannot parse policy document: ${err instanceof Error ? err.message : String(err)}`,
      { file },
    );
  }
  const parsed = PolicyDocumentSchema.safeParse(data);
  if (!parsed.success) {
    throwZodError(parsed.error, { msg: `Invalid policy document ${file}` });
  }
  const doc = parsed.data;
  const tables = Object.keys(doc.facts);
  return {
    file,
    theory: doc.theory ?? path.basename(file, path.extname(file)),
    kind: doc.kind,
    rules: doc.rules.map((entry) =>
      rule(toAtom(entry.head), entry.body.map(toLiteral)),
    ),
    tables,
    facts: tables.flatMap((table) =>
      doc.facts[table].map((values) => atom(table, values)),
    ),
  };
}
