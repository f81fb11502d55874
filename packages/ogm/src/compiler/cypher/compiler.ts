/**
 * Cypher Query Compiler
 *
 * Renders a clause list into Cypher text for Memgraph and Neo4j.
 *
 * Every clause renders to a fragment. Keyword clauses carry a space on each
 * side (` MATCH `, ` RETURN * `) and pattern fragments carry none (`(n:L)`),
 * so `match().node(...).return()` reads ` MATCH (p:Person) RETURN * `.
 * When two fragments meet on spaces only one is kept; text inside a fragment
 * is never touched.
 */

import type {
  Clause,
  Hops,
  NodeClause,
  Operand,
  Operator,
  OrderEntry,
  ProjectionEntry,
  RelationshipClause,
  WhereClause,
} from '../../ast'
import { escapeName, serialize, toCypherLabels, toCypherProperties } from '../../serializer'
import type { QueryCompilerProvider } from '../provider'

/**
 * Join fragments, collapsing the separator spaces where two fragments meet.
 */
export function joinFragments(fragments: readonly string[]): string {
  let cypher = ''
  for (const fragment of fragments) {
    if (fragment.length === 0) continue
    if (cypher.endsWith(' ') && fragment.startsWith(' ')) {
      cypher += fragment.slice(1)
    } else {
      cypher += fragment
    }
  }
  return cypher
}

/**
 * Cypher compiler implementation.
 */
export class CypherCompiler implements QueryCompilerProvider {
  readonly name = 'cypher'

  compile(clauses: readonly Clause[]): string {
    return joinFragments(clauses.map((clause) => this.render(clause)))
  }

  /**
   * Render a single clause to its fragment.
   */
  render(clause: Clause): string {
    switch (clause.type) {
      case 'match':
        return clause.optional ? ' OPTIONAL MATCH ' : ' MATCH '
      case 'merge':
        return ' MERGE '
      case 'create':
        return ' CREATE '
      case 'call':
        return ` CALL ${clause.procedure}(${clause.arguments}) `
      case 'node':
        return this.renderNode(clause)
      case 'relationship':
        return this.renderRelationship(clause)
      case 'where':
        return this.renderWhere(clause)
      case 'unwind':
        return ` UNWIND ${clause.expression} AS ${clause.variable} `
      case 'with':
        return ` WITH ${this.renderProjection(clause.items)} `
      case 'return':
        return ` RETURN ${this.renderProjection(clause.items)} `
      case 'yield':
        return ` YIELD ${this.renderProjection(clause.items)} `
      case 'union':
        return clause.all ? ' UNION ALL ' : ' UNION '
      case 'delete':
        return ` ${clause.detach ? 'DETACH ' : ''}DELETE ${clause.items.join(', ')} `
      case 'remove':
        return ` REMOVE ${clause.items.join(', ')} `
      case 'orderBy':
        return ` ORDER BY ${clause.items.map((item) => this.renderOrder(item)).join(', ')} `
      case 'limit':
        return ` LIMIT ${clause.count} `
      case 'skip':
        return ` SKIP ${clause.count} `
      case 'foreach':
        return ` FOREACH ( ${clause.variable} IN ${clause.expression} | ${clause.updates.join(' ')} ) `
      case 'set':
        return ` SET ${this.renderCondition(clause.item, clause.operator, clause.operand)} `
      case 'loadCsv':
        return ` LOAD CSV FROM ${serialize(clause.path)} ${clause.header ? 'WITH' : 'NO'} HEADER AS ${clause.row} `
      case 'raw':
        return clause.text
    }
  }

  // ===========================================================================
  // PATTERNS
  // ===========================================================================

  private renderNode(clause: NodeClause): string {
    const head = `${clause.variable ?? ''}${toCypherLabels(clause.labels)}`
    const properties = toCypherProperties(clause.properties)
    return `(${[head, properties].filter((part) => part.length > 0).join(' ')})`
  }

  private renderRelationship(clause: RelationshipClause): string {
    const type = clause.relationshipType ? `:${escapeName(clause.relationshipType)}` : ''
    const head = `${clause.variable ?? ''}${type}${this.renderHops(clause.hops)}`
    const properties = toCypherProperties(clause.properties)
    const body = `[${[head, properties].filter((part) => part.length > 0).join(' ')}]`

    switch (clause.direction) {
      case 'out':
        return `-${body}->`
      case 'in':
        return `<-${body}-`
      case 'none':
        return `-${body}-`
    }
  }

  private renderHops(hops: Hops | undefined): string {
    if (!hops) return ''
    const min = hops.min === undefined ? '' : String(hops.min)
    const max = hops.max === undefined ? '' : `..${hops.max}`
    return `*${min}${max}`
  }

  // ===========================================================================
  // CONDITIONS
  // ===========================================================================

  private renderWhere(clause: WhereClause): string {
    const keyword = clause.negated ? `${clause.keyword} NOT` : clause.keyword
    return ` ${keyword} ${this.renderCondition(clause.item, clause.operator, clause.operand)} `
  }

  /**
   * `item op value`, or `item:Label` for the label operator.
   */
  private renderCondition(item: string, operator: Operator, operand: Operand): string {
    if (operator === ':') {
      return `${item}${this.renderLabelOperand(operand)}`
    }
    return `${item} ${operator} ${this.renderOperand(operand)}`
  }

  private renderLabelOperand(operand: Operand): string {
    if (operand.kind === 'expression') return `:${operand.text}`
    const { value } = operand
    if (typeof value === 'string') return toCypherLabels(value)
    if (Array.isArray(value) && value.every((label): label is string => typeof label === 'string')) {
      return toCypherLabels(value)
    }
    return `:${serialize(value)}`
  }

  private renderOperand(operand: Operand): string {
    return operand.kind === 'literal' ? serialize(operand.value) : operand.text
  }

  // ===========================================================================
  // PROJECTIONS
  // ===========================================================================

  private renderProjection(items: readonly ProjectionEntry[]): string {
    if (items.length === 0) return '*'
    return items
      .map(({ expression, alias }) =>
        alias && alias !== expression ? `${expression} AS ${alias}` : expression,
      )
      .join(', ')
  }

  private renderOrder(item: OrderEntry): string {
    return item.direction ? `${item.expression} ${item.direction}` : item.expression
  }
}

/**
 * Create a Cypher compiler instance.
 */
export function createCypherCompiler(): CypherCompiler {
  return new CypherCompiler()
}
