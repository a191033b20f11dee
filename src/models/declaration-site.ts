/**
 * declaration-site.ts
 * Identifies where a metadata entry attaches.
 *
 * Shapes:
 *   class only                    → class declaration (model, controller)
 *   class + member                → method or property
 *   class + index (no member)     → constructor parameter
 *   class + member + index        → method parameter
 */

/** A class constructor, as handed to class decorators. */
export type ClassTarget = Function;

export interface DeclarationSite {
  readonly target: ClassTarget;
  readonly member?: string | symbol;
  readonly index?: number;
  /** True for static members; the target is then the constructor itself. */
  readonly isStatic?: boolean;
}

export type SiteShape = 'class' | 'member' | 'constructor-parameter' | 'method-parameter';

export function siteShape(site: DeclarationSite): SiteShape {
  if (site.member === undefined) {
    return site.index === undefined ? 'class' : 'constructor-parameter';
  }
  return site.index === undefined ? 'member' : 'method-parameter';
}

export function sameSite(a: DeclarationSite, b: DeclarationSite): boolean {
  return sameMember(a, b) && a.index === b.index;
}

/** Same class and same member (the owning method of a parameter site). */
export function sameMember(a: DeclarationSite, b: DeclarationSite): boolean {
  return (
    a.target === b.target &&
    a.member === b.member &&
    (a.isStatic ?? false) === (b.isStatic ?? false)
  );
}

export function memberName(member: string | symbol): string {
  return typeof member === 'symbol' ? member.toString() : member;
}

/**
 * Human-readable site label used in logs and error messages.
 * Examples: "TodoController", "TodoController.prototype.find",
 * "TodoController.prototype.find[0]", "TodoController.constructor[1]".
 */
export function describeSite(site: DeclarationSite): string {
  let label = site.target.name || '<anonymous>';
  if (site.member !== undefined) {
    label += site.isStatic === true ? '.' : '.prototype.';
    label += memberName(site.member);
  } else if (site.index !== undefined) {
    label += '.constructor';
  }
  if (site.index !== undefined) label += `[${site.index}]`;
  return label;
}
