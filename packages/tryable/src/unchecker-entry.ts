/**
 * tryable/unchecker entry point
 */
export {
  Unchecker,
  type CauseWrapper,
  IO_UNCHECKER,
  URI_UNCHECKER,
} from "./unchecker";
