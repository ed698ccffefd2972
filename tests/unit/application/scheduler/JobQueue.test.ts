import { JobQueue } from '../../../../src/application/services/scheduler/JobQueue';

interface Item {
  id: string;
  label?: string;
}

describe('JobQueue', () => {
  let queue: JobQueue<Item>;

  beforeEach(() => {
    queue = new JobQueue<Item>(3);
  });

  describe('enqueue', () => {
    it('should add an item to the queue', () => {
      expect(queue.enqueue({ id: 'a' })).toBe(true);
      expect(queue.size()).toBe(1);
      expect(queue.isEmpty()).toBe(false);
    });

    it('should not add duplicate ids', () => {
      queue.enqueue({ id: 'a', label: 'first' });

      expect(queue.enqueue({ id: 'a', label: 'second' })).toBe(false);
      expect(queue.size()).toBe(1);
      expect(queue.peek()?.label).toBe('first');
    });

    it('should refuse items beyond its depth', () => {
      queue.enqueue({ id: 'a' });
      queue.enqueue({ id: 'b' });
      queue.enqueue({ id: 'c' });

      expect(queue.isFull()).toBe(true);
      expect(queue.enqueue({ id: 'd' })).toBe(false);
    });
  });

  describe('dequeue', () => {
    it('should return null when queue is empty', () => {
      expect(queue.dequeue()).toBeNull();
      expect(queue.peek()).toBeNull();
    });

    it('should hand out items in submission order', () => {
      queue.enqueue({ id: 'a' });
      queue.enqueue({ id: 'b' });
      queue.enqueue({ id: 'c' });

      expect(queue.dequeue()?.id).toBe('a');
      expect(queue.dequeue()?.id).toBe('b');
      expect(queue.dequeue()?.id).toBe('c');
      expect(queue.isEmpty()).toBe(true);
    });
  });

  describe('remove', () => {
    it('should remove an item from the middle', () => {
      queue.enqueue({ id: 'a' });
      queue.enqueue({ id: 'b' });
      queue.enqueue({ id: 'c' });

      expect(queue.remove('b')?.id).toBe('b');
      expect(queue.ids()).toEqual(['a', 'c']);
      expect(queue.has('b')).toBe(false);
    });

    it('should return null for unknown ids', () => {
      expect(queue.remove('missing')).toBeNull();
    });
  });

  describe('drain', () => {
    it('should return everything and leave the queue empty', () => {
      queue.enqueue({ id: 'a' });
      queue.enqueue({ id: 'b' });

      expect(queue.drain().map(item => item.id)).toEqual(['a', 'b']);
      expect(queue.size()).toBe(0);
    });
  });

  describe('waitForItem', () => {
    it('should resolve immediately when items are queued', async () => {
      queue.enqueue({ id: 'a' });

      await expect(queue.waitForItem()).resolves.toBeUndefined();
    });

    it('should resolve once an item arrives', async () => {
      let woke = false;
      const waiting = queue.waitForItem().then(() => {
        woke = true;
      });

      await Promise.resolve();
      expect(woke).toBe(false);

      queue.enqueue({ id: 'a' });
      await waiting;
      expect(woke).toBe(true);
    });

    it('should resolve when the signal aborts', async () => {
      const controller = new AbortController();
      const waiting = queue.waitForItem(controller.signal);

      controller.abort('stop');

      await expect(waiting).resolves.toBeUndefined();
      expect(queue.isEmpty()).toBe(true);
    });
  });

  describe('waitForSpace', () => {
    it('should resolve immediately when the queue has room', async () => {
      queue.enqueue({ id: 'a' });

      await expect(queue.waitForSpace()).resolves.toBeUndefined();
    });

    it('should resolve once a full queue hands out an item', async () => {
      queue.enqueue({ id: 'a' });
      queue.enqueue({ id: 'b' });
      queue.enqueue({ id: 'c' });

      let woke = false;
      const waiting = queue.waitForSpace().then(() => {
        woke = true;
      });

      await Promise.resolve();
      expect(woke).toBe(false);

      queue.dequeue();
      await waiting;
      expect(woke).toBe(true);
      expect(queue.size()).toBe(2);
    });
  });
});
