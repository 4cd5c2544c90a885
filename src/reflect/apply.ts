/**
 * @module reflect/apply
 *
 * 依次应用类型声明上列出的元函数：先查内置目录，再查外部提供的插件表
 * （键为 `cpp2_metafunction_<name>`）。
 */

import type { DeclarationNode, IdExpressionNode, UnqualifiedIdNode } from '../types.js';
import { DiagnosticCode, DiagnosticError, Diagnostics, toDiagnostic } from '../diagnostics/diagnostics.js';
import type { ErrorList } from '../diagnostics/error-list.js';
import { printIdExpression, printTemplateArgument } from '../ast/printer.js';
import type { MetafunctionApplier, MetafunctionEnvironment } from '../parser.js';
import { CompilerServices, MetafunctionRequireError } from './compiler-services.js';
import { TypeDeclaration } from './declarations.js';
import { createBuiltinCatalogue } from './metafunctions.js';
import type { Metafunction, MetafunctionOutput } from './metafunctions.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('reflect');

/** 元函数名到实现的查找 */
export type MetafunctionLookup = (name: string) => Metafunction | undefined;

export interface MetafunctionApplierOptions {
  /** 外部提供的元函数，键为 pluginSymbol(name) */
  readonly plugins?: ReadonlyMap<string, Metafunction>;
  /** `@print` 的输出；默认写到 stdout */
  readonly output?: MetafunctionOutput;
}

/** 外部元函数在插件表中的导出名；限定名中的 `::` 换成 `_` */
export function pluginSymbol(name: string): string {
  return `cpp2_metafunction_${name.split('::').join('_')}`;
}

function lastUnqualifiedId(meta: IdExpressionNode): UnqualifiedIdNode | null {
  if (meta.id.kind === 'UnqualifiedId') return meta.id;
  return meta.id.ids[meta.id.ids.length - 1]?.id ?? null;
}

/**
 * 把元函数运行中抛出的异常记入错误列表。
 * MetafunctionRequireError 对应的错误已经由 require 记录。
 */
function recordFailure(errors: ErrorList, e: unknown, rtype: TypeDeclaration): void {
  if (e instanceof MetafunctionRequireError) return;
  if (e instanceof DiagnosticError) {
    errors.add(e.diagnostic);
    return;
  }
  errors.add(toDiagnostic(e, rtype.position()));
}

/**
 * 对类型 node 依次应用它的元函数。
 *
 * @returns 存在保留名、未知元函数、未使用的模板实参，或任一元函数记录了错误时返回 false
 */
export function applyMetafunctions(
  node: DeclarationNode,
  rtype: TypeDeclaration,
  services: CompilerServices,
  errors: ErrorList,
  lookup: MetafunctionLookup,
  knownNames: readonly string[]
): boolean {
  const report = (code: DiagnosticCode, message: string, pos = rtype.position()): void => {
    errors.add(Diagnostics.metafunction(code, message, pos).build());
  };

  let reservedOk = true;
  for (const m of rtype.getMembers()) {
    const name = m.name();
    if (name.startsWith('_') && name.length > 1) {
      report(
        DiagnosticCode.R001_MetafunctionRequirement,
        "a type that applies a metafunction cannot have a body that declares a name that starts with '_' - those names are reserved for the metafunction implementation",
        m.position()
      );
      reservedOk = false;
    }
  }
  if (!reservedOk) return false;

  for (const meta of node.metafunctions) {
    const fullName = printIdExpression(meta);
    const angle = fullName.indexOf('<');
    const name = angle === -1 ? fullName : fullName.slice(0, angle);
    const args = lastUnqualifiedId(meta)?.templateArgs.map(printTemplateArgument) ?? [];
    services.setMetafunctionName(name, args);

    const fn = lookup(name);
    if (fn === undefined) {
      report(DiagnosticCode.R003_UnknownMetafunction, `unrecognized metafunction name: ${name}`, meta.span.start);
      if (!name.includes('::')) {
        report(
          DiagnosticCode.R003_UnknownMetafunction,
          `(temporary alpha limitation) currently the supported names are: ${knownNames.join(', ')}`,
          meta.span.start
        );
      }
      return false;
    }

    logger.debug('Applying metafunction', { metafunction: name, type: rtype.name(), args });
    try {
      fn(rtype);
    } catch (e) {
      recordFailure(errors, e, rtype);
      return false;
    }
    if (services.hasNewErrors()) return false;

    if (args.length > 0 && !services.argumentsWereUsed()) {
      report(
        DiagnosticCode.R004_UnusedMetafunctionArguments,
        `${name} did not use its template arguments - did you mean to write '${name} <${args[0]}> type' (with the spaces)?`,
        meta.span.start
      );
      return false;
    }
  }
  return true;
}

/**
 * 创建交给 Parser 的元函数应用器。
 */
export function createMetafunctionApplier(options: MetafunctionApplierOptions = {}): MetafunctionApplier {
  const catalogue = createBuiltinCatalogue(options.output ?? (text => console.log(text)));
  const plugins = options.plugins ?? new Map<string, Metafunction>();
  const lookup: MetafunctionLookup = name => catalogue.get(name) ?? plugins.get(pluginSymbol(name));
  const knownNames = [...catalogue.keys()];

  return (decl: DeclarationNode, env: MetafunctionEnvironment): boolean => {
    const services = new CompilerServices({
      errors: env.errors,
      generated: env.generated,
      generatedDeclarations: env.generatedDeclarations,
      parser: env.parser,
      position: decl.span.start,
    });
    const rtype = new TypeDeclaration(decl, services);
    return applyMetafunctions(decl, rtype, services, env.errors, lookup, knownNames);
  };
}
