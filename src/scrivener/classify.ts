/**
 * Any binder item may carry its own text and children at the same time.
 * The importer decides what to build from this classification.
 */
export enum BinderItemShape {
  DOCUMENT_ONLY = 'documentOnly',
  FOLDER_ONLY = 'folderOnly',
  BOTH = 'both',
  EMPTY = 'empty',
}

export function classifyBinderItem(hasContent: boolean, hasChildren: boolean): BinderItemShape {
  if (hasContent && hasChildren) return BinderItemShape.BOTH;
  if (hasContent) return BinderItemShape.DOCUMENT_ONLY;
  if (hasChildren) return BinderItemShape.FOLDER_ONLY;
  return BinderItemShape.EMPTY;
}
