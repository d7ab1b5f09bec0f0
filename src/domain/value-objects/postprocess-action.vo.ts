/**
 * Catalog action run after a successful download.
 */
export type PostprocessAction =
  | { readonly action: 'move'; readonly targetCollectionId: string }
  | { readonly action: 'remove' };

export function describeAction(action: PostprocessAction): string {
  switch (action.action) {
    case 'move':
      return `move to ${action.targetCollectionId}`;
    case 'remove':
      return 'remove';
  }
}
