// Terminal view: title bar, post list, status bar.
// Selection is owned by BrowserState; the list widget only mirrors it.

import blessed from "blessed";
import type { Renderer } from "./app";
import { KEY_HINTS, formatPostLine, placeholder, statusLine } from "./format";
import type { BrowserEvent, BrowserState } from "./state";

export class TerminalView implements Renderer {
  private readonly screen: blessed.Widgets.Screen;
  private readonly header: blessed.Widgets.BoxElement;
  private readonly list: blessed.Widgets.ListElement;
  private readonly message: blessed.Widgets.BoxElement;
  private readonly statusBar: blessed.Widgets.BoxElement;

  constructor() {
    this.screen = blessed.screen({
      smartCSR: true,
      title: "devnews",
      fullUnicode: true,
      autoPadding: true,
    });

    this.header = blessed.box({
      parent: this.screen,
      top: 0,
      left: 0,
      width: "100%",
      height: 1,
      tags: true,
      content: ` {bold}{cyan-fg}Developer News{/cyan-fg}{/bold}  ${KEY_HINTS}`,
      style: { bg: "black" },
    });

    this.list = blessed.list({
      parent: this.screen,
      top: 1,
      left: 0,
      width: "100%",
      height: "100%-2",
      border: { type: "line" },
      tags: false,
      keys: false,
      mouse: false,
      items: [],
      style: {
        border: { fg: "blue" },
        selected: { bg: "blue", fg: "white", bold: true },
        item: { fg: "white" },
      },
    });

    this.message = blessed.box({
      parent: this.screen,
      top: "center",
      left: "center",
      width: "80%",
      height: 7,
      align: "center",
      valign: "middle",
      tags: false,
      hidden: true,
      border: { type: "line" },
      style: { border: { fg: "yellow" } },
    });

    this.statusBar = blessed.box({
      parent: this.screen,
      bottom: 0,
      left: 0,
      width: "100%",
      height: 1,
      tags: false,
      style: { fg: "white", bg: "blue" },
    });
  }

  /** Rows a page-up/page-down moves: the visible list height. */
  pageSize(): number {
    return Math.max(1, this.screen.rows - 4);
  }

  bindKeys(dispatch: (event: BrowserEvent) => void): void {
    const on = (keys: string[], event: () => BrowserEvent) =>
      this.screen.key(keys, () => dispatch(event()));

    on(["up", "k"], () => ({ type: "move", delta: -1 }));
    on(["down", "j"], () => ({ type: "move", delta: 1 }));
    on(["pageup", "u"], () => ({ type: "move", delta: -this.pageSize() }));
    on(["pagedown", "d"], () => ({ type: "move", delta: this.pageSize() }));
    on(["g", "home"], () => ({ type: "jump", to: "top" }));
    on(["S-g", "end"], () => ({ type: "jump", to: "bottom" }));
    on(["enter", "o"], () => ({ type: "open" }));
    on(["r", "S-r"], () => ({ type: "refresh" }));
    on(["escape"], () => ({ type: "dismiss" }));
    on(["q", "C-c"], () => ({ type: "quit" }));
  }

  render(state: BrowserState): void {
    const posts = state.snapshot?.posts ?? [];
    this.list.setItems(posts.map((p, i) => formatPostLine(p, i + 1)));
    if (posts.length > 0) this.list.select(state.selectedIndex);

    const text = placeholder(state);
    if (text === null) {
      this.message.hide();
    } else {
      this.message.setContent(text);
      this.message.show();
    }

    this.statusBar.setContent(` ${statusLine(state)}`);
    this.screen.render();
  }

  destroy(): void {
    this.screen.destroy();
  }
}
