export {
  type ArrayAttributes,
  type ArrayStore,
  type AttributeValue,
  InMemoryArrayStore,
} from "./array-store";
