interface Waiter {
  exclusive: boolean
  grant: () => void
}

/**
 * Many readers or a single writer. Waiters are served in arrival order, so a
 * queued writer holds back the readers that come after it.
 */
export default class ReadWriteLock {
  private activeReaders = 0
  private writing = false
  private readonly waiting: Waiter[] = []

  public get readers(): number {
    return this.activeReaders
  }

  public get isWriting(): boolean {
    return this.writing
  }

  public get pending(): number {
    return this.waiting.length
  }

  public async read<T>(task: () => T | Promise<T>): Promise<T> {
    await this.acquire(false)

    try {
      return await task()
    } finally {
      this.release(false)
    }
  }

  public async write<T>(task: () => T | Promise<T>): Promise<T> {
    await this.acquire(true)

    try {
      return await task()
    } finally {
      this.release(true)
    }
  }

  private acquire(exclusive: boolean): Promise<void> {
    if (this.waiting.length === 0 && this.canGrant(exclusive)) {
      this.take(exclusive)

      return Promise.resolve()
    }

    return new Promise((resolve) => {
      this.waiting.push({
        exclusive,
        grant: () => {
          this.take(exclusive)
          resolve()
        }
      })
    })
  }

  private canGrant(exclusive: boolean): boolean {
    return exclusive ? !this.writing && this.activeReaders === 0 : !this.writing
  }

  private take(exclusive: boolean): void {
    if (exclusive) {
      this.writing = true
    } else {
      this.activeReaders++
    }
  }

  private release(exclusive: boolean): void {
    if (exclusive) {
      this.writing = false
    } else {
      this.activeReaders--
    }

    let next = this.waiting[0]

    while (next && this.canGrant(next.exclusive)) {
      this.waiting.shift()
      next.grant()
      next = this.waiting[0]
    }
  }
}
