import { extract } from "tar-stream";
import { ProtocolError } from "../core/errors.js";
import type { FileTree, FileTreeNode } from "./types.js";

export interface TarEntry {
  name: string;
  /** tar entry type: "file", "directory", "symlink", "link", ... */
  type?: string | null;
  linkname?: string | null;
}

/**
 * Builds a FileTree from tar headers in archive order. Nodes live in one
 * array; each directory keeps a name → index map so re-entering it by name
 * is a lookup.
 */
export class FileTreeBuilder {
  private readonly files: string[] = [];
  private readonly nodes: FileTreeNode[];
  private readonly dirIndex: Array<Map<string, number>>;

  constructor(rootName = ".") {
    this.nodes = [{ name: rootName, isDir: true, children: [] }];
    this.dirIndex = [new Map()];
  }

  add(entry: TarEntry): void {
    this.files.push(entry.name);

    const isDir = entry.type === "directory" || entry.name.endsWith("/");
    const segments = entry.name
      .replace(/\/+$/, "")
      .split("/")
      .filter((s) => s !== "" && s !== ".");
    if (segments.length === 0) return;

    let current = 0;
    segments.forEach((segment, i) => {
      const last = i === segments.length - 1;
      if (last && !isDir) {
        const link = (entry.type === "symlink" || entry.type === "link") && entry.linkname;
        this.appendChild(current, { name: link ? `${segment} -> ${link}` : segment, isDir: false, children: [] });
        return;
      }
      current = this.enterDir(current, segment);
    });
  }

  build(): FileTree {
    return { files: [...this.files], nodes: this.nodes.map((n) => ({ ...n, children: [...n.children] })) };
  }

  private enterDir(parent: number, name: string): number {
    const existing = this.dirIndex[parent].get(name);
    if (existing !== undefined) return existing;
    const index = this.appendChild(parent, { name, isDir: true, children: [] });
    this.dirIndex[parent].set(name, index);
    return index;
  }

  private appendChild(parent: number, node: FileTreeNode): number {
    const index = this.nodes.length;
    this.nodes.push(node);
    this.dirIndex.push(new Map());
    this.nodes[parent].children.push(index);
    return index;
  }
}

/** Consume a tar stream (export / archive endpoints) into a FileTree. */
export function buildFileTree(tar: NodeJS.ReadableStream, signal?: AbortSignal, rootName = "."): Promise<FileTree> {
  const builder = new FileTreeBuilder(rootName);
  const parser = extract();

  return new Promise<FileTree>((resolve, reject) => {
    const onAbort = () => {
      parser.destroy();
      reject(signal?.reason);
    };
    if (signal?.aborted) {
      onAbort();
      return;
    }
    signal?.addEventListener("abort", onAbort, { once: true });

    parser.on("entry", (header, body, next) => {
      builder.add({ name: header.name, type: header.type, linkname: header.linkname });
      body.on("end", () => next());
      body.resume();
    });
    parser.on("finish", () => {
      signal?.removeEventListener("abort", onAbort);
      resolve(builder.build());
    });
    parser.on("error", (err: Error) => {
      signal?.removeEventListener("abort", onAbort);
      reject(new ProtocolError(`reading archive: ${err.message}`, { cause: err }));
    });
    tar.on("error", (err: Error) => parser.destroy(err));
    tar.pipe(parser);
  });
}

/** Render with ├── / └── / │ connectors, root first. */
export function renderFileTree(tree: FileTree): string {
  const root = tree.nodes[0];
  if (!root) return "";
  const lines = [root.name];

  const walk = (index: number, prefix: string) => {
    const children = tree.nodes[index].children;
    children.forEach((child, i) => {
      const last = i === children.length - 1;
      lines.push(`${prefix}${last ? "└── " : "├── "}${tree.nodes[child].name}`);
      walk(child, prefix + (last ? "    " : "│   "));
    });
  };
  walk(0, "");

  return lines.join("\n");
}
