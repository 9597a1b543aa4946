'use client'

import { motion, type Transition } from 'framer-motion'

const floatY = { y: [0, -12, 0] }
const floatTransition: Transition = {
    duration: 2.5,
    repeat: Infinity,
    ease: [0.42, 0, 0.58, 1],
}

export default function Header() {
    return (
        <header className="relative flex h-[30vh] items-center justify-center">
            <motion.h1
                className="z-10 text-6xl font-extrabold text-green-400 drop-shadow-[4px_4px_0_#000]"
                animate={floatY}
                transition={floatTransition}
            >
                REPLAYLIST
            </motion.h1>
        </header>
    )
}
