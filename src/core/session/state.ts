/**
 * Session context of the analyzed code: the catalog and schema a notebook
 * or job runs against when a name is not qualified.
 */
export class CurrentSessionState {
  constructor(
    readonly schema: string | null = null,
    readonly catalog: string | null = null
  ) {}
}
