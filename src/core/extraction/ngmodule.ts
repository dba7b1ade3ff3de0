/**
 * NgModule record extraction from Angular module source files.
 *
 * Reads the exported module class name, an optional `@layer` tag and the
 * `imports`/`exports`/`providers`/`declarations` arrays of the `@NgModule`
 * decorator. Files are parsed with ts-morph but never type-checked.
 */
import * as path from 'node:path';
import { Node, Project, type Decorator, type Expression, type SourceFile } from 'ts-morph';
import type { ModuleKind, ModuleRecord } from '../registry/schema.js';

export interface ExtractionOptions {
  /** Package import prefixes never treated as dependencies */
  ignoreImportPrefixes: string[];
  /** Add non-relative import specifiers to the declared dependencies */
  includePackageImports: boolean;
}

export const DEFAULT_EXTRACTION_OPTIONS: ExtractionOptions = {
  ignoreImportPrefixes: ['@angular/', 'rxjs'],
  includePackageImports: true,
};

/** Metadata arrays read from the decorator, one source text per entry. */
export interface NgModuleMetadata {
  imports: string[];
  exports: string[];
  providers: string[];
  declarations: string[];
}

const METADATA_FIELDS = ['imports', 'exports', 'providers', 'declarations'] as const;
type MetadataField = (typeof METADATA_FIELDS)[number];
type MetadataNodes = Record<MetadataField, Expression[]>;

const LAYER_TAG = /@layer\s+(core|shared|feature)\b/i;
const MODULE_CLASS_NAME = /^[A-Za-z_$][\w$]*Module$/;
const SOURCE_EXTENSION = /\.[cm]?[jt]sx?$/;
const EMPTY_METADATA: MetadataNodes = { imports: [], exports: [], providers: [], declarations: [] };

const LAYER_KINDS = new Map<string, ModuleKind>([
  ['core', 'Core'],
  ['shared', 'Shared'],
  ['feature', 'Feature'],
]);

let project: Project | null = null;

function getProject(): Project {
  project ??= new Project({
    useInMemoryFileSystem: true,
    compilerOptions: {
      allowJs: true,
      skipLibCheck: true,
    },
    skipAddingFilesFromTsConfig: true,
    skipFileDependencyResolution: true,
  });
  return project;
}

function isMetadataField(key: string): key is MetadataField {
  return METADATA_FIELDS.some((field) => field === key);
}

function dedupe(values: string[]): string[] {
  return [...new Set(values)];
}

/**
 * Parse `content` into a scratch source file, run `read` on it, then drop it.
 */
export function withModuleSource<T>(
  content: string,
  read: (sourceFile: SourceFile) => T,
  fileName = 'module.ts'
): T {
  const scratch = getProject();
  const sourceFile = scratch.createSourceFile(`/extract/${fileName}`, content, { overwrite: true });
  try {
    return read(sourceFile);
  } finally {
    scratch.removeSourceFile(sourceFile);
  }
}

/**
 * Kind stated by a `@layer core|shared|feature` tag anywhere in the file.
 */
export function readLayerTag(content: string): ModuleKind | undefined {
  const match = LAYER_TAG.exec(content);
  return match ? LAYER_KINDS.get(match[1].toLowerCase()) : undefined;
}

/**
 * Reduce one metadata entry to the module it names.
 *
 * `RouterModule.forChild(routes)` -> `RouterModule`,
 * `...SHARED_MODULES` -> `SHARED_MODULES`,
 * `ns.SharedModule` -> `SharedModule`.
 * Returns null for entries that are not references (literals, object specs).
 */
export function referenceName(node: Node): string | null {
  if (Node.isSpreadElement(node)) {
    return referenceName(node.getExpression());
  }
  if (Node.isCallExpression(node)) {
    const callee = node.getExpression();
    return referenceName(Node.isPropertyAccessExpression(callee) ? callee.getExpression() : callee);
  }
  if (Node.isPropertyAccessExpression(node)) {
    return node.getName();
  }
  if (Node.isIdentifier(node)) {
    return node.getText();
  }
  return null;
}

function findNgModuleDecorator(sourceFile: SourceFile): Decorator | undefined {
  for (const cls of sourceFile.getClasses()) {
    const decorator = cls.getDecorator('NgModule');
    if (decorator) {
      return decorator;
    }
  }
  return undefined;
}

function propertyKey(name: Node): string | null {
  if (Node.isIdentifier(name)) {
    return name.getText();
  }
  if (Node.isStringLiteral(name) || Node.isNoSubstitutionTemplateLiteral(name)) {
    return name.getLiteralText();
  }
  return null;
}

function entriesOf(value: Expression | undefined): Expression[] {
  if (!value) {
    return [];
  }
  return Node.isArrayLiteralExpression(value) ? value.getElements() : [value];
}

function readMetadataNodes(sourceFile: SourceFile): MetadataNodes | null {
  const decorator = findNgModuleDecorator(sourceFile);
  const [argument] = decorator?.getArguments() ?? [];
  if (!argument || !Node.isObjectLiteralExpression(argument)) {
    return null;
  }

  const nodes: MetadataNodes = { imports: [], exports: [], providers: [], declarations: [] };
  for (const property of argument.getProperties()) {
    if (!Node.isPropertyAssignment(property)) {
      continue;
    }
    const key = propertyKey(property.getNameNode());
    if (key !== null && isMetadataField(key)) {
      nodes[key] = entriesOf(property.getInitializer());
    }
  }
  return nodes;
}

/**
 * Metadata arrays of the first class decorated with `@NgModule({...})`.
 * Returns null when there is no such decorator object.
 */
export function readNgModuleMetadata(sourceFile: SourceFile): NgModuleMetadata | null {
  const nodes = readMetadataNodes(sourceFile);
  return nodes ? metadataText(nodes) : null;
}

function metadataText(nodes: MetadataNodes): NgModuleMetadata {
  const text = (entries: Expression[]): string[] => entries.map((entry) => entry.getText());
  return {
    imports: text(nodes.imports),
    exports: text(nodes.exports),
    providers: text(nodes.providers),
    declarations: text(nodes.declarations),
  };
}

/**
 * Non-relative import specifiers with bindings, minus ignored prefixes.
 * Side-effect imports (`import 'zone.js'`) are not dependencies.
 */
export function readPackageImports(sourceFile: SourceFile, ignorePrefixes: readonly string[]): string[] {
  const specifiers: string[] = [];
  for (const declaration of sourceFile.getImportDeclarations()) {
    if (!declaration.getImportClause()) {
      continue;
    }
    const specifier = declaration.getModuleSpecifierValue();
    if (specifier.startsWith('.') || specifier.startsWith('/')) {
      continue;
    }
    if (ignorePrefixes.some((prefix) => specifier.startsWith(prefix))) {
      continue;
    }
    specifiers.push(specifier);
  }
  return dedupe(specifiers);
}

function moduleClassName(sourceFile: SourceFile): string | undefined {
  for (const cls of sourceFile.getClasses()) {
    const name = cls.getName();
    if (name && cls.isExported() && MODULE_CLASS_NAME.test(name)) {
      return name;
    }
  }
  return undefined;
}

function normalizePath(relativePath: string): string {
  return relativePath.replace(/\\/g, '/');
}

/**
 * Build a module record from one source file.
 *
 * Identity is the first exported `...Module` class, else the file name
 * without `.ts`. Declared dependencies are the `imports` entries reduced to
 * the names they reference, followed by package imports when enabled.
 */
export function extractModuleRecord(
  relativePath: string,
  content: string,
  options: ExtractionOptions = DEFAULT_EXTRACTION_OPTIONS
): ModuleRecord {
  const baseName = path.posix.basename(normalizePath(relativePath));

  const record = withModuleSource(
    content,
    (sourceFile): ModuleRecord => {
      const nodes = readMetadataNodes(sourceFile) ?? EMPTY_METADATA;
      const metadata = metadataText(nodes);

      const referenced = nodes.imports
        .map(referenceName)
        .filter((name): name is string => name !== null);
      const packages = options.includePackageImports
        ? readPackageImports(sourceFile, options.ignoreImportPrefixes)
        : [];

      return {
        identity: moduleClassName(sourceFile) ?? path.posix.basename(baseName, '.ts'),
        originPath: relativePath,
        declaredDependencies: dedupe([...referenced, ...packages]),
        ...metadata,
      };
    },
    SOURCE_EXTENSION.test(baseName) ? baseName : `${baseName}.ts`
  );

  const declaredKind = readLayerTag(content);
  if (declaredKind) {
    record.declaredKind = declaredKind;
  }

  return record;
}
