export { MutationNotifier } from "./notifier"
