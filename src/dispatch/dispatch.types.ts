export type DispatchRoute =
  | 'internal'
  | 'mapped'
  | 'candidate'
  | 'disambiguated'
  | 'fallback';

export const INTERNAL_HANDLER = 'internal';
export const FALLBACK_HANDLER = 'general_chat';

export interface DispatchResult {
  responseText: string;
  /** Handler name, `internal` or `general_chat` */
  handlerUsed: string;
  route: DispatchRoute;
  /** The handler threw or timed out; the response is its apology */
  failed: boolean;
  contextCleared: boolean;
}
