export {
  ShoppingItemSchema,
  ShoppingListSchema,
  DEFAULT_LIST_COLOR,
  parseShoppingList,
  safeParseShoppingList,
  createShoppingList,
  createShoppingItem,
  isTombstone,
  activeItems,
  deletedItems,
  visibleLists,
  completionProgress,
  toMillis,
  updateListDetails,
  addItem,
  applyItemPatch,
  updateItem,
  softDeleteItem,
  clearCompletedItems,
  softDeleteList,
  removeItems,
  type ShoppingItem,
  type ShoppingList,
  type ListMetadata,
  type CreateListInput,
  type CreateItemInput,
  type ListDetailsPatch,
  type ItemPatch,
} from "./shopping-list.js";
