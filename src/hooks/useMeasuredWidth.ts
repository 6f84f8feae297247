import { useEffect, useRef, useState } from 'react'

export function useMeasuredWidth<T extends HTMLElement>(fallback = 0) {
  const ref = useRef<T | null>(null)
  const [width, setWidth] = useState<number>(fallback)

  useEffect(() => {
    const el = ref.current
    if (!el) return

    const measure = () => {
      const w = Math.floor(el.getBoundingClientRect().width)
      setWidth(w > 0 ? w : fallback)
    }

    let ro: ResizeObserver | null = null

    if (typeof ResizeObserver !== 'undefined') {
      ro = new ResizeObserver(() => measure())
      ro.observe(el)
    } else {
      window.addEventListener('resize', measure)
    }

    measure()

    return () => {
      if (ro) ro.disconnect()
      else window.removeEventListener('resize', measure)
    }
  }, [fallback])

  return { ref, width }
}
