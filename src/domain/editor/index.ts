//
//
//

export { EditorSession, Tool } from "./session";
export type { EditorSessionOptions } from "./session";
