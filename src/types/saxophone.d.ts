/**
 * Type declarations for saxophone, which ships none
 */

declare module 'saxophone' {
  export interface TagOpenNode {
    name: string;
    /** Raw attribute string, entities not decoded */
    attrs: string;
    isSelfClosing: boolean;
  }

  export interface TagCloseNode {
    name: string;
  }

  export interface ContentNode {
    contents: string;
  }

  export default class Saxophone {
    constructor();
    write(chunk: Buffer | string): boolean;
    end(chunk?: Buffer | string): void;
    on(event: 'tagopen', listener: (tag: TagOpenNode) => void): this;
    on(event: 'tagclose', listener: (tag: TagCloseNode) => void): this;
    on(event: 'text' | 'cdata' | 'comment' | 'processinginstruction', listener: (node: ContentNode) => void): this;
    on(event: 'error', listener: (error: Error) => void): this;
    on(event: 'finish', listener: () => void): this;
  }
}
