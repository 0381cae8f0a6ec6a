import type {
  Pos,
} from '../types.js';

import type {
  Template,
} from '../template.js';

import {
  Expression,
} from '../expression.js';

import {
  TemplateSyntaxError,
} from '../errors.js';

/**
 * Where a directive attribute was found while parsing.
 */
export interface DirectiveSite {
  readonly template: Template;
  readonly pos: Pos;
}

/**
 * Expression bound to the lookup mode of the template being parsed.
 *
 * @param site - Directive location.
 * @param source - Expression source.
 */
export const siteExpression = (site: DirectiveSite, source: string): Expression =>
  new Expression(source, { lookup: site.template.config.lookupErrors });

/**
 * Syntax error at the element carrying the directive.
 *
 * @param site - Directive location.
 * @param message - Error message.
 */
export const siteSyntaxError = (site: DirectiveSite, message: string): TemplateSyntaxError =>
  new TemplateSyntaxError(message, site.template.filename, site.pos[0], site.pos[1]);
