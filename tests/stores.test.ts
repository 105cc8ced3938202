import { Store, StoreController } from "../src/core/stores"
import type { ReactiveController, ReactiveControllerHost } from "lit"

class FakeHost implements ReactiveControllerHost {
  controllers: ReactiveController[] = []
  updates = 0
  updateComplete = Promise.resolve(true)

  addController(controller: ReactiveController) {
    this.controllers.push(controller)
  }

  removeController(controller: ReactiveController) {
    this.controllers = this.controllers.filter((c) => c !== controller)
  }

  requestUpdate() {
    this.updates++
  }
}

describe('Store', () => {
  test('notifies subscribers until they unsubscribe', () => {
    const store = new Store(1)
    const seen: number[] = []
    const unsubscribe = store.subscribe((v) => seen.push(v))

    store.set(2)
    unsubscribe()
    store.set(3)

    expect(seen).toEqual([2])
    expect(store.get()).toBe(3)
  })
})

describe('StoreController', () => {
  test('tracks the store while the host is connected', () => {
    const store = new Store('brush')
    const host = new FakeHost()
    const controller = new StoreController(host, store)
    expect(host.controllers).toEqual([controller])

    store.set('rectangle')
    expect(controller.value).toBe('brush')

    controller.hostConnected()
    expect(controller.value).toBe('rectangle')

    controller.set('brush')
    expect(store.get()).toBe('brush')
    expect(controller.value).toBe('brush')
    expect(host.updates).toBe(1)

    controller.hostDisconnected()
    store.set('rectangle')
    expect(controller.value).toBe('brush')
    expect(host.updates).toBe(1)
  })
})
