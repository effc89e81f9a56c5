type Callback<T> = (args: T) => void;

export class EventHandler<Events extends Record<string, unknown>> {
  #listenersMap: { [K in keyof Events]?: Callback<Events[K]>[] };

  constructor() {
    this.#listenersMap = {};
  }

  fireEvent<K extends keyof Events>(name: K, args: Events[K]) {
    const callbacks = this.#listenersMap[name];
    if (!callbacks) return;

    // a listener may remove itself while we iterate
    [...callbacks].forEach((callback) => {
      callback(args);
    });
  }

  addEventListener<K extends keyof Events>(name: K, callback: Callback<Events[K]>) {
    let callbacks = this.#listenersMap[name];
    if (!callbacks) {
      callbacks = [];
      this.#listenersMap[name] = callbacks;
    }

    callbacks.push(callback);
  }

  removeEventListener<K extends keyof Events>(name: K, callback: Callback<Events[K]>) {
    const callbacks = this.#listenersMap[name];
    if (!callbacks) return;

    const index = callbacks.indexOf(callback);
    if (index > -1) {
      callbacks.splice(index, 1);
    }
  }
}
