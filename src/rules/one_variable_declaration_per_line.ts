import { DiagnosticCode } from '../diagnostics/diagnostics.js';
import type { FormatRule, RuleContext } from '../rewrite/rule.js';
import {
  endsWithLineComment,
  leadingTriviaOnNewLine,
  replaceLeadingTrivia,
  replaceTrailingTrivia,
  withoutNewlines,
} from '../rewrite/trivia_utils.js';
import {
  SyntaxKind,
  codeBlockItemParts,
  firstToken,
  isNodeOfKind,
  lastToken,
  patternBindingParts,
  variableDeclParts,
  withBindings,
  withChildren,
  withItem,
  withTrailingComma,
  withTypeAnnotation,
  type SyntaxElement,
  type SyntaxNode,
} from '../syntax/syntax.js';
import { EMPTY_TRIVIA, concatTrivia, containsComment, type Trivia } from '../syntax/trivia.js';

/**
 * Each variable declaration, with the exception of tuple destructuring,
 * should declare one variable.
 *
 * Lint: a declaration with several bindings raises W001.
 *
 * Format: the declaration is split into one declaration per binding, each on
 * its own line. A type annotation written once (`var a, b: Int`) applies to
 * every binding, so bindings without their own annotation receive a copy.
 */
export class OneVariableDeclarationPerLine implements FormatRule {
  readonly name = 'OneVariableDeclarationPerLine';

  processStatements(items: SyntaxNode, context: RuleContext): SyntaxNode | null {
    if (!items.children.some(item => splittableDecl(item) !== null)) return null;

    const newItems: SyntaxElement[] = [];
    for (const item of items.children) {
      const decl = splittableDecl(item);
      if (decl === null || !isNodeOfKind(item, SyntaxKind.CodeBlockItem)) {
        newItems.push(item);
        continue;
      }
      context.diagnose(DiagnosticCode.W001_OneVariableDeclarationPerLine, decl);
      newItems.push(...splitDeclaration(item, decl));
    }
    return withChildren(items, newItems);
  }
}

/** The VariableDecl wrapped by `item` when it has more than one binding. */
function splittableDecl(item: SyntaxElement): SyntaxNode | null {
  if (!isNodeOfKind(item, SyntaxKind.CodeBlockItem)) return null;
  const inner = codeBlockItemParts(item).item;
  if (inner.kind !== SyntaxKind.VariableDecl) return null;
  return variableDeclParts(inner).bindings.length > 1 ? inner : null;
}

function splitDeclaration(item: SyntaxNode, decl: SyntaxNode): SyntaxNode[] {
  const { introducer, bindings } = variableDeclParts(decl);
  // Only the last binding can carry an annotation when several share one, but
  // take the last one present rather than rely on its position.
  let inherited: SyntaxNode | null = null;
  for (const binding of bindings) {
    inherited = patternBindingParts(binding).typeAnnotation ?? inherited;
  }

  return bindings.map((binding, index) => {
    let newBinding = binding;
    if (inherited && patternBindingParts(binding).typeAnnotation === null) {
      newBinding = withInheritedAnnotation(newBinding, inherited);
    }
    const { binding: withoutComma, displaced } = dropTrailingComma(newBinding);

    let newDecl = withBindings(decl, [withoutComma]);
    // The first declaration takes the place of the original statement and
    // keeps its trivia; the others start a new line.
    if (index > 0) {
      const bindingStart = firstToken(withoutComma);
      if (bindingStart) {
        // A line comment after the keyword runs to the end of the line, so the
        // binding has to start the next one.
        const leading = endsWithLineComment(introducer.trailingTrivia)
          ? leadingTriviaOnNewLine(bindingStart.leadingTrivia)
          : withoutNewlines(bindingStart.leadingTrivia);
        if (leading.length > 0 || bindingStart.leadingTrivia.length > 0) {
          newDecl = replaceLeadingTrivia(newDecl, bindingStart, leading);
        }
      }
      newDecl = replaceLeadingTrivia(newDecl, introducer, leadingTriviaOnNewLine(introducer.leadingTrivia));
    }

    let newItem = withItem(item, newDecl);
    const end = lastToken(newItem);
    if (displaced.length > 0 && end) {
      newItem = replaceTrailingTrivia(newItem, end, concatTrivia(end.trailingTrivia, displaced));
    }
    return newItem;
  });
}

/**
 * Insert `annotation` after the binding's pattern. Whatever trailed the
 * pattern now trails the annotation, and the annotation's own trailing trivia
 * (a comment after the type, typically) stays with the binding that wrote it.
 */
function withInheritedAnnotation(binding: SyntaxNode, annotation: SyntaxNode): SyntaxNode {
  const patternEnd = lastToken(patternBindingParts(binding).pattern);
  const annotationEnd = lastToken(annotation);
  if (!patternEnd || !annotationEnd) return withTypeAnnotation(binding, annotation);
  return withTypeAnnotation(
    replaceTrailingTrivia(binding, patternEnd, EMPTY_TRIVIA),
    replaceTrailingTrivia(annotation, annotationEnd, patternEnd.trailingTrivia)
  );
}

/**
 * Remove the separator comma. Comments around it are returned so the caller
 * can keep them at the end of the new statement; plain whitespace is dropped.
 */
function dropTrailingComma(binding: SyntaxNode): { binding: SyntaxNode; displaced: Trivia } {
  const parts = patternBindingParts(binding);
  if (parts.trailingComma === null) return { binding, displaced: EMPTY_TRIVIA };
  const around = concatTrivia(parts.trailingComma.leadingTrivia, parts.trailingComma.trailingTrivia);
  return {
    binding: withTrailingComma(binding, null),
    displaced: containsComment(around) ? around : EMPTY_TRIVIA,
  };
}
