import type { QueryResult, QueryResultRow } from 'pg'

/**
 * Anything that runs a parameterized query: the pool, or a client checked out for a transaction
 */
export interface Queryable {
    query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>
}
