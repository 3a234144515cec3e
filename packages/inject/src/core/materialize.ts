import type { ConfigurationChild } from "@confbind/config"
import type { ListCollector } from "../ports/target-type"

type CoerceChild<E> = (child: ConfigurationChild) => E

export function materializeArray<E>(
  children: readonly ConfigurationChild[],
  coerce: CoerceChild<E>,
): E[] {
  const result = new Array<E>(children.length)

  children.forEach((child, i) => {
    result[i] = coerce(child)
  })

  return result
}

export function materializeList<E, C>(
  children: readonly ConfigurationChild[],
  coerce: CoerceChild<E>,
  collector: ListCollector<E, C>,
): C {
  const list = collector.create()

  for (const child of children) {
    collector.append(list, coerce(child))
  }

  return list
}

export function materializeReadOnlyList<E>(
  children: readonly ConfigurationChild[],
  coerce: CoerceChild<E>,
): readonly E[] {
  return Object.freeze(materializeArray(children, coerce))
}

export function arrayCollector<E>(): ListCollector<E, E[]> {
  return {
    create: () => [],
    append: (list, item) => {
      list.push(item)
    },
  }
}
